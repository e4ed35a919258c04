import {
  createPatternMatcher,
  splitLines,
} from '../../src/analysis/patterns.js';

describe('pattern matcher', () => {
  const matcher = createPatternMatcher();

  it('matches vocabularies case-insensitively', () => {
    expect(matcher.count('enthusiasm', 'GREAT')).toBe(1);
    expect(matcher.count('enthusiasm', 'great')).toBe(1);
    expect(matcher.count('enthusiasm', 'This is GREAT and great, Perfect!')).toBe(3);
  });

  it('counts confusion phrases', () => {
    expect(matcher.count('confusion', "I'm confused, NOT SURE what you want")).toBe(2);
    expect(matcher.count('confusion', 'Can you clarify? I am not following.')).toBe(2);
  });

  it('counts compaction requests as substrings', () => {
    expect(matcher.count('compaction', 'Please be concise and brief')).toBe(2);
    expect(matcher.count('compaction', 'use the shortcut')).toBe(1);
  });

  it('counts complete fenced regions, not their size', () => {
    const text = '```a```\ntext\n```\nline one\nline two\n```';
    expect(matcher.count('codeBlock', text)).toBe(2);
    expect(matcher.count('codeBlock', '```a```\n```')).toBe(1);
    expect(matcher.count('codeBlock', 'no fences here')).toBe(0);
  });

  it('counts lines that start with a role marker', () => {
    const text = 'Human: hi\nAssistant: hello\n  Human: indented\nSay Human: no';
    expect(matcher.count('exchange', text)).toBe(2);
  });

  it('handles CRLF transcripts', () => {
    expect(matcher.count('exchange', 'Human: x\r\nAssistant: y\r\n')).toBe(2);
  });

  it('gives identical counts on repeated calls', () => {
    const text = 'Human: great great\nAssistant: ```x``` exactly';
    const first = matcher.countAll(text);
    const second = matcher.countAll(text);
    expect(second).toEqual(first);
    expect(first).toEqual({
      enthusiasm: 3,
      confusion: 0,
      compaction: 0,
      codeBlock: 1,
      exchange: 2,
    });
  });

  it('analyzes a short conversation', () => {
    const content = [
      '',
      'Human: This is great! Can you help me with ```rust',
      'fn main() {',
      '    println!("Hello, world!");',
      '}',
      '```',
      'Assistant: Sure! This code creates a simple Hello World program.',
      '',
    ].join('\n');

    const counts = matcher.countAll(content);
    expect(counts.exchange).toBe(2);
    expect(counts.codeBlock).toBe(1);
    expect(counts.enthusiasm).toBe(1);
  });

  it('rejects text patterns without the global flag', () => {
    expect(() =>
      createPatternMatcher([{ category: 'enthusiasm', pattern: /great/i, scope: 'text' }]),
    ).toThrow('must use the g flag');
  });

  it('returns zero for categories missing from a custom table', () => {
    const custom = createPatternMatcher([
      { category: 'enthusiasm', pattern: /yay/gi, scope: 'text' },
    ]);
    expect(custom.count('enthusiasm', 'yay YAY')).toBe(2);
    expect(custom.count('confusion', 'confused')).toBe(0);
  });
});

describe('splitLines', () => {
  it('drops the trailing empty line and carriage returns', () => {
    expect(splitLines('a\r\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('')).toEqual([]);
    expect(splitLines('\n\n')).toEqual(['', '']);
  });
});
