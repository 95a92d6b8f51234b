/**
 * Unit tests for Extractor
 */

import { describe, it, expect } from 'vitest';
import { Extractor } from '../../src/extractor';
import { ExpressionSyntaxError, UnsupportedConstructError } from '../../src/errors';

describe('Extractor', () => {
  const extractor = new Extractor();

  describe('datafields and bindings', () => {
    it('should treat every bare name as a datafield when nothing is assigned', () => {
      const result = extractor.extract('close * volume / cap');

      expect(result.datafields).toEqual(['close', 'volume', 'cap']);
      expect(result.operators).toEqual(['*', '/']);
    });

    it('should not report names bound by an earlier statement', () => {
      const result = extractor.extract('a = b; c = a + d');

      expect(result.datafields).toEqual(['b', 'd']);
      expect(result.operators).toEqual(['+']);
    });

    it('should read each line as its own statement', () => {
      const parenthesized = extractor.extract('a = b\n(c)');
      expect(parenthesized.operators).toEqual([]);
      expect(parenthesized.datafields).toEqual(['b', 'c']);
      expect(parenthesized.callSites).toEqual([]);

      const negated = extractor.extract('a = close\n-open');
      expect(negated.operators).toEqual(['-']);
      expect(negated.datafields).toEqual(['close', 'open']);
    });

    it('should collapse repeated operators and datafields', () => {
      const result = extractor.extract('x+x+y');

      expect(result.operators).toEqual(['+']);
      expect(result.datafields).toEqual(['x', 'y']);
      expect(result.operatorUses).toHaveLength(2);
      expect(result.datafieldRefs.map(ref => ref.name)).toEqual(['x', 'x', 'y']);
    });

    it('should report a self-reference to an unbound name', () => {
      expect(extractor.extract('a = a + 1').datafields).toEqual(['a']);
    });

    it('should keep a binding for every later statement', () => {
      expect(extractor.extract('a = 1; b = 2; a + b + c').datafields).toEqual(['c']);
    });

    it('should not look ahead to later assignments', () => {
      expect(extractor.extract('b + 1; b = 2; b').datafields).toEqual(['b']);
    });

    it('should bind every target of a chained assignment', () => {
      expect(extractor.extract('a = b = close; a + b').datafields).toEqual(['close']);
    });

    it('should read the target of an augmented assignment before binding it', () => {
      const unbound = extractor.extract('x += 1');
      expect(unbound.datafields).toEqual(['x']);
      expect(unbound.operators).toEqual(['+']);

      const bound = extractor.extract('x = 1; x -= y');
      expect(bound.datafields).toEqual(['y']);
      expect(bound.operators).toEqual(['-']);
    });

    it('should never treat keyword names as datafields', () => {
      expect(extractor.extract('ts_rank(close, 5, constant=1)').datafields).toEqual(['close']);
    });

    it('should walk keyword values', () => {
      const result = extractor.extract('f(x, w=y)');

      expect(result.datafields).toEqual(['x', 'y']);
      expect(result.datafieldRefs[1]).toEqual({ name: 'y', enclosingCall: 0, position: { line: 1, column: 8 } });
    });

    it('should return empty lists for an empty expression', () => {
      expect(extractor.extract('')).toEqual({
        operators: [],
        datafields: [],
        callSites: [],
        operatorUses: [],
        datafieldRefs: []
      });
    });
  });

  describe('operators', () => {
    it('should record operators in source order', () => {
      expect(extractor.extract('a * b + c').operators).toEqual(['*', '+']);
      expect(extractor.extract('a + b * c').operators).toEqual(['+', '*']);
      expect(extractor.extract('ts_mean(close, 5) > open').operators).toEqual(['ts_mean', '>']);
    });

    it('should record unary operators but not signed literals', () => {
      const negated = extractor.extract('-x');
      expect(negated.operators).toEqual(['-']);
      expect(negated.operatorUses[0]).toEqual({
        operator: '-', kind: 'unary', operandCount: 1, position: { line: 1, column: 1 }
      });

      expect(extractor.extract('-1').operators).toEqual([]);
    });

    it('should record a logical chain once with its operand count', () => {
      const result = extractor.extract('a && b && c');

      expect(result.operatorUses).toEqual([
        { operator: '&&', kind: 'logical', operandCount: 3, position: { line: 1, column: 8 } }
      ]);
    });

    it('should record calls with their positional argument count', () => {
      const result = extractor.extract('hump(x, 0.5, hump=0.1)');

      expect(result.operatorUses).toEqual([
        { operator: 'hump', kind: 'call', operandCount: 2, callIndex: 0, position: { line: 1, column: 1 } }
      ]);
    });
  });

  describe('call sites', () => {
    it('should index calls outer first, in source order', () => {
      const result = extractor.extract('f(g(a), h(b))');

      expect(result.callSites.map(site => [site.index, site.operator])).toEqual([
        [0, 'f'],
        [1, 'g'],
        [2, 'h']
      ]);
      expect(result.datafieldRefs.map(ref => [ref.name, ref.enclosingCall])).toEqual([
        ['a', 1],
        ['b', 2]
      ]);
    });

    it('should number calls across statements', () => {
      const result = extractor.extract('a = f(x); g(a)');

      expect(result.callSites.map(site => site.operator)).toEqual(['f', 'g']);
      expect(result.callSites[1].index).toBe(1);
    });

    it('should mark references outside any call', () => {
      const result = extractor.extract('close + f(open)');

      expect(result.datafieldRefs.map(ref => ref.enclosingCall)).toEqual([null, 0]);
    });

    it('should keep the last value of a repeated keyword and flag it', () => {
      const result = extractor.extract('f(a, w=1, w=2, w=3)');
      const site = result.callSites[0];

      expect(site.args).toHaveLength(1);
      expect(site.duplicateKeywords).toEqual(['w']);
      const value = site.keywords.get('w');
      expect(value?.kind === 'literal' ? value.value : undefined).toBe(3);
    });

    it('should expose keyword values by name', () => {
      const site = extractor.extract('quantile(x, driver="gaussian", sigma=0.5)').callSites[0];

      expect(Array.from(site.keywords.keys())).toEqual(['driver', 'sigma']);
      expect(site.duplicateKeywords).toEqual([]);
    });
  });

  describe('errors', () => {
    it('should propagate syntax errors', () => {
      expect(() => extractor.extract('f(')).toThrow(ExpressionSyntaxError);
    });

    it('should propagate unsupported constructs', () => {
      expect(() => extractor.extract('close.shift(1)')).toThrow(UnsupportedConstructError);
    });
  });
});
