import { describe, it, expect } from 'vitest';
import { PorcelainStatusParser } from '../../../src/infrastructure/vcs/PorcelainStatusParser.js';

describe('PorcelainStatusParser', () => {
  const parser = new PorcelainStatusParser();

  it('should classify porcelain codes', () => {
    const output = [
      '?? new.txt',
      'A  staged.ts',
      ' M edited.ts',
      'MM both.ts',
      ' D removed.ts',
      'R  old.ts -> moved.ts',
      '',
    ].join('\n');

    expect(parser.parse(output)).toEqual([
      { code: '??', path: 'new.txt', status: 'added' },
      { code: 'A ', path: 'staged.ts', status: 'added' },
      { code: ' M', path: 'edited.ts', status: 'modified' },
      { code: 'MM', path: 'both.ts', status: 'modified' },
      { code: ' D', path: 'removed.ts', status: 'deleted' },
      { code: 'R ', path: 'moved.ts', status: 'renamed' },
    ]);
  });

  it('should unquote paths with special characters', () => {
    expect(parser.parse('?? "dir/with space.txt"\n')).toEqual([
      { code: '??', path: 'dir/with space.txt', status: 'added' },
    ]);
  });

  it('should return nothing for a clean tree', () => {
    expect(parser.parse('')).toEqual([]);
  });
});
