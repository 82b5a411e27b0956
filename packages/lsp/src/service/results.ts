import type { CompletionItem } from '../types.js';

const EMPTY_ITEMS: CompletionItem[] = [];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const markupText = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value) && typeof value.value === 'string') {
    return value.value;
  }
  return undefined;
};

function toCompletionItem(item: unknown): CompletionItem[] {
  if (!isRecord(item) || typeof item.label !== 'string') {
    return EMPTY_ITEMS;
  }

  const label = item.label;
  const completion: CompletionItem = {
    label,
    insertText: typeof item.insertText === 'string' ? item.insertText : label,
  };
  if (typeof item.kind === 'number') {
    completion.kind = item.kind;
  }
  if (typeof item.detail === 'string') {
    completion.detail = item.detail;
  }
  const documentation = markupText(item.documentation);
  if (documentation !== undefined) {
    completion.documentation = documentation;
  }
  return [completion];
}

/**
 * Flattens a `textDocument/completion` result, either a `CompletionList` or a
 * bare item array. Items without a string label are skipped.
 */
export function toCompletionItems(result: unknown): CompletionItem[] {
  if (Array.isArray(result)) {
    return result.flatMap(toCompletionItem);
  }
  if (isRecord(result) && Array.isArray(result.items)) {
    return result.items.flatMap(toCompletionItem);
  }
  return EMPTY_ITEMS;
}

/**
 * Extracts display text from a `textDocument/hover` result. Handles
 * `MarkupContent`, `MarkedString` and arrays of either.
 */
export function toHoverText(result: unknown): string | null {
  if (!isRecord(result)) {
    return null;
  }

  const contents = result.contents;
  if (Array.isArray(contents)) {
    const parts = contents.flatMap((item) => {
      const text = markupText(item);
      return text === undefined ? [] : [text];
    });
    return parts.length > 0 ? parts.join('\n') : null;
  }

  return markupText(contents) ?? null;
}
