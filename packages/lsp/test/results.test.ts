import { describe, expect, it } from 'vitest';

import { toCompletionItems, toHoverText } from '../src/service/results.js';

describe('toCompletionItems', () => {
  it('reads the items of a completion list', () => {
    expect(
      toCompletionItems({
        isIncomplete: false,
        items: [
          { label: 'SELECT', kind: 14 },
          {
            label: 'users',
            kind: 7,
            detail: 'table',
            insertText: '"users"',
            documentation: { kind: 'markdown', value: '**users** table' },
          },
        ],
      }),
    ).toEqual([
      { label: 'SELECT', kind: 14, insertText: 'SELECT' },
      {
        label: 'users',
        kind: 7,
        detail: 'table',
        insertText: '"users"',
        documentation: '**users** table',
      },
    ]);
  });

  it('accepts a bare item array and skips items without a label', () => {
    expect(
      toCompletionItems([{ label: 'id' }, { kind: 5 }, 'junk', null]),
    ).toEqual([{ label: 'id', insertText: 'id' }]);
  });

  it('returns an empty list for null and other shapes', () => {
    expect(toCompletionItems(null)).toEqual([]);
    expect(toCompletionItems({ items: 'nope' })).toEqual([]);
  });
});

describe('toHoverText', () => {
  it('reads MarkupContent', () => {
    expect(
      toHoverText({ contents: { kind: 'plaintext', value: 'id: integer' } }),
    ).toBe('id: integer');
  });

  it('reads a plain marked string', () => {
    expect(toHoverText({ contents: 'users table' })).toBe('users table');
  });

  it('joins an array of marked strings', () => {
    expect(
      toHoverText({
        contents: ['name', { language: 'sql', value: 'varchar(64)' }],
      }),
    ).toBe('name\nvarchar(64)');
  });

  it('returns null when there is nothing to show', () => {
    expect(toHoverText(null)).toBeNull();
    expect(toHoverText({ contents: [] })).toBeNull();
    expect(toHoverText({ range: {} })).toBeNull();
  });
});
