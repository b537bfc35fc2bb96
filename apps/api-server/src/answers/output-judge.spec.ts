import { normalizeOutput, outputsMatch } from './output-judge';

describe('output judge', () => {
  it('normalises Windows and old Mac line endings', () => {
    expect(normalizeOutput('1\r\n2\r3')).toBe('1\n2\n3');
  });

  it('drops trailing whitespace of lines and of the text', () => {
    expect(normalizeOutput('a  \nb\t\n\n')).toBe('a\nb');
  });

  it('keeps leading whitespace', () => {
    expect(outputsMatch('  3', '3')).toBe(false);
  });

  it('matches outputs that differ only in trailing newlines', () => {
    expect(outputsMatch('3\n', '3')).toBe(true);
  });

  it('rejects different values', () => {
    expect(outputsMatch('4', '3')).toBe(false);
  });
});
