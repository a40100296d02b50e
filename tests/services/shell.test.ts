import { describe, it, expect } from 'vitest';
import { shellQuote } from '../../src/services/shell.js';

describe('shellQuote', () => {
  it('wraps plain values in single quotes', () => {
    expect(shellQuote('/home/user/my dir')).toBe("'/home/user/my dir'");
  });

  it('escapes embedded single quotes', () => {
    expect(shellQuote("don't")).toBe("'don'\\''t'");
  });

  it('leaves shell metacharacters inert', () => {
    expect(shellQuote('$(rm -rf ~)')).toBe("'$(rm -rf ~)'");
  });
});
