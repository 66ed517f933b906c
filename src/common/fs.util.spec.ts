import { csvEscape, toFileStem } from './fs.util';

describe('csvEscape', () => {
  it('leaves plain values bare', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape(42)).toBe('42');
    expect(csvEscape(null)).toBe('');
    expect(csvEscape(undefined)).toBe('');
  });

  it('quotes values with commas, quotes or line breaks', () => {
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('line\nbreak')).toBe('"line\nbreak"');
    expect(csvEscape('cr\rhere')).toBe('"cr\rhere"');
  });
});

describe('toFileStem', () => {
  it('drops @ and replaces spaces and slashes', () => {
    expect(toFileStem('@My Channel/Clips')).toBe('My_Channel_Clips');
    expect(toFileStem('  Simple ')).toBe('Simple');
  });
});
