import { buildCaptureArgs, shellQuote } from '../../src/session/capture.js';

describe('capture arguments', () => {
  it('puts the command after the log file on macOS', () => {
    expect(buildCaptureArgs('darwin', '/tmp/a.log', 'claude', ['--model', 'opus'])).toEqual([
      '-q',
      '/tmp/a.log',
      'claude',
      '--model',
      'opus',
    ]);
  });

  it('passes one command string on Linux', () => {
    expect(buildCaptureArgs('linux', '/tmp/a.log', 'claude', ['--model', 'opus'])).toEqual([
      '-q',
      '-c',
      'claude --model opus',
      '/tmp/a.log',
    ]);
  });

  it('quotes arguments with spaces on Linux', () => {
    const args = buildCaptureArgs('linux', '/tmp/a.log', 'claude', ['fix the bug']);
    expect(args[2]).toBe("claude 'fix the bug'");
  });

  it('escapes single quotes', () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(shellQuote('plain-arg')).toBe('plain-arg');
  });
});
