import { escapeLikePattern, truncateWithEllipsis } from '../../../src/utils/text';

describe('truncateWithEllipsis', () => {
  it('leaves short values alone', () => {
    expect(truncateWithEllipsis('abc', 3)).toBe('abc');
  });

  it('cuts long values and marks the cut', () => {
    expect(truncateWithEllipsis('abcdef', 3)).toBe('abc...');
  });

  it('passes null through', () => {
    expect(truncateWithEllipsis(null, 3)).toBeNull();
  });
});

describe('escapeLikePattern', () => {
  it('escapes wildcard and escape characters', () => {
    expect(escapeLikePattern('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('leaves ordinary text unchanged', () => {
    expect(escapeLikePattern('Budget review')).toBe('Budget review');
  });
});
