export { loadMessageBundle, formatMessage } from './message-bundle.js';
