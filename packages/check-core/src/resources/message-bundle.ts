/**
 * Message Bundle
 *
 * Localized rule messages, loaded from a flat JSON object of strings.
 */

import { readFile } from 'node:fs/promises';
import type { MessageBundle } from '@proofmark/core';
import { CheckError, messageBundleSchema } from '@proofmark/core';

/**
 * Read and validate a message bundle file.
 */
export async function loadMessageBundle(filePath: string): Promise<MessageBundle> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new CheckError({
      code: 'RESOURCE_LOAD_FAILED',
      message: `Could not load message bundle: ${filePath}`,
      suggestion: 'Check that the messages path in the configuration exists.',
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new CheckError({
      code: 'RESOURCE_LOAD_FAILED',
      message: `Message bundle is not valid JSON: ${filePath}`,
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  const result = messageBundleSchema.safeParse(parsed);
  if (!result.success) {
    throw new CheckError({
      code: 'RESOURCE_LOAD_FAILED',
      message: `Message bundle must map keys to strings: ${filePath}`,
      context: { filePath, issues: result.error.issues.length },
    });
  }

  return result.data;
}

/**
 * Look up a message and fill `{0}`, `{1}`... placeholders. Unknown keys
 * render as the key itself.
 */
export function formatMessage(
  bundle: MessageBundle,
  key: string,
  ...args: Array<string | number>
): string {
  const template = Object.hasOwn(bundle, key) ? bundle[key] ?? key : key;
  return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? placeholder : String(value);
  });
}
