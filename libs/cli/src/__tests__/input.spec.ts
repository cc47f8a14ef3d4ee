import { EntryValidationError } from '@quicklaunch/core';
import { formatDefaultList, parseDefaultList, parseDefaults, parseTags } from '../input';

describe('parseTags', () => {
  it('splits on commas and leaves cleanup to the entry model', () => {
    expect(parseTags('git, vcs')).toEqual(['git', ' vcs']);
    expect(parseTags(undefined)).toEqual([]);
  });
});

describe('parseDefaults', () => {
  it('splits each pair at the first equals sign', () => {
    expect(parseDefaults(['dir=.', 'filter = a=b'])).toEqual({ dir: '.', filter: 'a=b' });
  });

  it('keeps an empty value, which clears a default', () => {
    expect(parseDefaults(['dir='])).toEqual({ dir: '' });
  });

  it('rejects a pair without a name or an equals sign', () => {
    expect(() => parseDefaults(['=x'])).toThrow(EntryValidationError);
    expect(() => parseDefaults(['dir'])).toThrow("Expected name=value, got 'dir'");
  });
});

describe('default lists', () => {
  it('parses a comma separated list, ignoring blanks', () => {
    expect(parseDefaultList('dir=., port=8080, ')).toEqual({ dir: '.', port: '8080' });
    expect(parseDefaultList('')).toEqual({});
  });

  it('formats only placeholders that have a default', () => {
    expect(formatDefaultList([{ name: 'repo' }, { name: 'dir', default: '.' }, { name: 'port', default: '80' }])).toBe(
      'dir=., port=80',
    );
  });
});
