import { describe, expect, it } from 'vitest';
import { StructuralValidator } from '../structural-validator.js';
import { rejectionOf } from './helpers.js';

describe('StructuralValidator', () => {
  const jql = new StructuralValidator({ language: 'jql', delimiters: [['(', ')']], maxDepth: 3 });
  const graphql = new StructuralValidator({
    language: 'graphql',
    delimiters: [['{', '}']],
    maxDepth: 10,
    blockStrings: true,
    lineComment: '#'
  });

  it('returns the deepest nesting level', () => {
    expect(jql.validate('(a (b) (c (d)))')).toBe(3);
    expect(jql.validate('project = "TEST"')).toBe(0);
  });

  it('ignores delimiters inside string literals', () => {
    expect(jql.validate('summary ~ "(((("')).toBe(0);
    expect(jql.validate('summary ~ "say \\"(\\""')).toBe(0);
  });

  it('rejects unterminated strings before looking at delimiters', () => {
    const error = rejectionOf(() => jql.validate('("abc'));

    expect(error.kind).toBe('UnbalancedQuotes');
    expect(error.message).toBe('Unbalanced quotes in JQL query');
  });

  it('rejects a closing delimiter that comes before its opener', () => {
    const error = rejectionOf(() => jql.validate('a = 1)('));

    expect(error.kind).toBe('UnbalancedDelimiters');
    expect(error.message).toBe("Unbalanced '()' delimiters in JQL query");
  });

  it('rejects missing closing delimiters', () => {
    expect(rejectionOf(() => jql.validate('((a)')).kind).toBe('UnbalancedDelimiters');
  });

  it('rejects nesting beyond the limit', () => {
    const error = rejectionOf(() => jql.validate('((((a))))'));

    expect(error.kind).toBe('NestingTooDeep');
    expect(error.message).toBe('JQL nesting too deep (max 3 levels)');
    expect(error.context).toEqual({ depth: 4, maxDepth: 3 });
  });

  it('treats block strings as a single literal', () => {
    expect(graphql.validate('{ a(text: """say "hi" {""") }')).toBe(1);
    expect(rejectionOf(() => graphql.validate('{ a(text: """open) }')).kind).toBe('UnbalancedQuotes');
  });

  it('skips line comments', () => {
    expect(graphql.validate('{ a # } {\n}')).toBe(1);
  });
});
