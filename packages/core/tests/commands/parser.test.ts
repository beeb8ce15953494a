import { describe, it, expect } from 'vitest';
import { isCommand, parseCommand } from '../../src/commands/parser.ts';

describe('isCommand', () => {
  it('should detect a leading slash after trimming', () => {
    expect(isCommand('/help')).toBe(true);
    expect(isCommand(' /status ')).toBe(true);
    expect(isCommand('\n\t/search x')).toBe(true);
  });

  it('should reject text without a leading slash', () => {
    expect(isCommand('status')).toBe(false);
    expect(isCommand('a/b')).toBe(false);
    expect(isCommand('')).toBe(false);
  });
});

describe('parseCommand', () => {
  it('should parse a bare command', () => {
    expect(parseCommand('/help')).toEqual({ name: 'help', args: [] });
  });

  it('should split arguments on whitespace', () => {
    expect(parseCommand('/search foo bar')).toEqual({ name: 'search', args: ['foo', 'bar'] });
  });

  it('should collapse runs of mixed whitespace', () => {
    expect(parseCommand('  /search   foo \t bar\nbaz  ')).toEqual({
      name: 'search',
      args: ['foo', 'bar', 'baz'],
    });
  });

  it('should lower-case the name but not the arguments', () => {
    expect(parseCommand('/SeArCh Foo')).toEqual({ name: 'search', args: ['Foo'] });
  });

  it('should not interpret quotes', () => {
    expect(parseCommand('/search "two words"')).toEqual({ name: 'search', args: ['"two', 'words"'] });
  });

  it('should return null for a lone slash', () => {
    expect(parseCommand('/')).toBeNull();
    expect(parseCommand('  /   ')).toBeNull();
  });

  it('should return null for non-command text', () => {
    expect(parseCommand('hello')).toBeNull();
    expect(parseCommand('')).toBeNull();
  });
});
