import { describe, it, expect } from 'vitest';
import {
  commonTypes, createOptionalType, createNamedType, createUnionType, findAliasCycle, isAssignable, joinTypes,
  typeToString, typesEqual, substituteTypeParameters, TypeEnvironment, NamedTypeInfo
} from '../src/type-utils';
import { t } from '../src/builder';
import { StructuralError } from '../src/types';

function environment(entries: Record<string, NamedTypeInfo>): TypeEnvironment {
  const table = new Map(Object.entries(entries));
  return { lookupNamed: name => table.get(name) };
}

describe('Type utilities', () => {
  describe('construction', () => {
    it('collapses nested optionals', () => {
      const once = createOptionalType(t.int);
      expect(createOptionalType(once)).toBe(once);
    });

    it('treats optional null as null', () => {
      expect(createOptionalType(t.null)).toBe(commonTypes.null);
    });

    it('rejects a union with a single member', () => {
      expect(() => createUnionType([t.int])).toThrow(StructuralError);
    });

    it('rejects an empty named type', () => {
      expect(() => createNamedType('  ')).toThrow('named type requires a non-empty identifier');
    });
  });

  describe('typeToString', () => {
    it('spells composite types', () => {
      expect(typeToString(t.map(t.string, t.list(t.optional(t.int))))).toBe('Mapping<string, Sequence<int?>>');
      expect(typeToString(t.fn([t.int, t.string], t.bool))).toBe('(int, string) -> bool');
      expect(typeToString(t.named('Box', t.float))).toBe('Box<float>');
    });

    it('parenthesises optional unions and functions', () => {
      expect(typeToString(t.optional(t.union(t.int, t.string)))).toBe('(int | string)?');
      expect(typeToString(t.optional(t.fn([], t.void)))).toBe('(() -> void)?');
    });

    it('quotes string literal types', () => {
      expect(typeToString(t.literal('on'))).toBe('"on"');
      expect(typeToString(t.literal(3))).toBe('3');
    });
  });

  describe('isAssignable', () => {
    it('widens int to float but not the reverse', () => {
      expect(isAssignable(t.int, t.float)).toBe(true);
      expect(isAssignable(t.float, t.int)).toBe(false);
    });

    it('accepts null and the inner type into an optional', () => {
      expect(isAssignable(t.null, t.optional(t.string))).toBe(true);
      expect(isAssignable(t.string, t.optional(t.string))).toBe(true);
      expect(isAssignable(t.optional(t.string), t.string)).toBe(false);
    });

    it('treats any as compatible both ways', () => {
      expect(isAssignable(t.any, t.list(t.int))).toBe(true);
      expect(isAssignable(t.map(t.string, t.int), t.any)).toBe(true);
    });

    it('keeps sequence elements invariant in kind', () => {
      expect(isAssignable(t.list(t.int), t.list(t.float))).toBe(true);
      expect(isAssignable(t.list(t.int), t.set(t.int))).toBe(false);
    });

    it('requires every union member to fit the target', () => {
      expect(isAssignable(t.union(t.int, t.float), t.float)).toBe(true);
      expect(isAssignable(t.union(t.int, t.string), t.float)).toBe(false);
      expect(isAssignable(t.string, t.union(t.int, t.string))).toBe(true);
    });

    it('accepts a literal where its base primitive is expected', () => {
      expect(isAssignable(t.literal('a'), t.string)).toBe(true);
      expect(isAssignable(t.literal(2), t.float)).toBe(true);
      expect(isAssignable(t.literal(true), t.literal(false))).toBe(false);
    });

    it('is contravariant in function parameters', () => {
      const takesFloat = t.fn([t.float], t.int);
      const takesInt = t.fn([t.int], t.int);
      expect(isAssignable(takesFloat, takesInt)).toBe(true);
      expect(isAssignable(takesInt, takesFloat)).toBe(false);
    });

    it('follows class supertypes with substituted type arguments', () => {
      const env = environment({
        Animal: { kind: 'class', typeParameters: [], supertypes: [] },
        Dog: { kind: 'class', typeParameters: [], supertypes: [t.named('Animal')] },
        Box: { kind: 'class', typeParameters: ['T'], supertypes: [] },
        IntBox: { kind: 'class', typeParameters: [], supertypes: [t.named('Box', t.int)] }
      });
      expect(isAssignable(t.named('Dog'), t.named('Animal'), env)).toBe(true);
      expect(isAssignable(t.named('Animal'), t.named('Dog'), env)).toBe(false);
      expect(isAssignable(t.named('IntBox'), t.named('Box', t.int), env)).toBe(true);
      expect(isAssignable(t.named('IntBox'), t.named('Box', t.string), env)).toBe(false);
    });

    it('follows supertypes past the direct parent', () => {
      const env = environment({
        Animal: { kind: 'class', typeParameters: [], supertypes: [] },
        Dog: { kind: 'class', typeParameters: [], supertypes: [t.named('Animal')] },
        Puppy: { kind: 'class', typeParameters: [], supertypes: [t.named('Dog')] }
      });
      expect(isAssignable(t.named('Puppy'), t.named('Animal'), env)).toBe(true);
      expect(isAssignable(t.named('Animal'), t.named('Puppy'), env)).toBe(false);
    });

    it('terminates on aliases that recur through a sequence', () => {
      const env = environment({
        A: { kind: 'alias', aliased: t.named('B'), distinct: false },
        B: { kind: 'alias', aliased: t.list(t.named('A')), distinct: false }
      });
      expect(isAssignable(t.named('B'), t.named('A'), env)).toBe(true);
      expect(isAssignable(t.list(t.int), t.named('A'), env)).toBe(false);
    });

    it('lets a distinct alias flow into its underlying type only', () => {
      const env = environment({
        UserId: { kind: 'alias', aliased: t.int, distinct: true },
        Count: { kind: 'alias', aliased: t.int, distinct: false }
      });
      expect(isAssignable(t.named('UserId'), t.int, env)).toBe(true);
      expect(isAssignable(t.int, t.named('UserId'), env)).toBe(false);
      expect(isAssignable(t.int, t.named('Count'), env)).toBe(true);
    });
  });

  describe('findAliasCycle', () => {
    it('finds an alias naming itself', () => {
      const env = environment({ Id: { kind: 'alias', aliased: t.named('Id'), distinct: true } });
      expect(findAliasCycle('Id', env)).toEqual(['Id', 'Id']);
    });

    it('finds a cycle through another alias and a sequence', () => {
      const env = environment({
        A: { kind: 'alias', aliased: t.named('B'), distinct: false },
        B: { kind: 'alias', aliased: t.list(t.named('A')), distinct: false }
      });
      expect(findAliasCycle('A', env)).toEqual(['A', 'B', 'A']);
      expect(findAliasCycle('B', env)).toEqual(['B', 'A', 'B']);
    });

    it('stops at classes', () => {
      const env = environment({
        Tree: { kind: 'class', typeParameters: [], supertypes: [] },
        Forest: { kind: 'alias', aliased: t.list(t.named('Tree')), distinct: false }
      });
      expect(findAliasCycle('Forest', env)).toBeUndefined();
    });
  });

  describe('joinTypes', () => {
    it('joins int and float to float', () => {
      expect(joinTypes(t.int, t.float)).toEqual(t.float);
    });

    it('joins null with a type into an optional', () => {
      expect(joinTypes(t.null, t.string)).toEqual({ kind: 'optional', inner: t.string });
    });

    it('joins unrelated types into a union', () => {
      expect(typeToString(joinTypes(t.int, t.string))).toBe('int | string');
    });
  });

  it('substitutes type parameters inside composite types', () => {
    const mapping = new Map([['T', t.string]]);
    const substituted = substituteTypeParameters(t.map(t.named('T'), t.list(t.named('T'))), mapping);
    expect(typesEqual(substituted, t.map(t.string, t.list(t.string)))).toBe(true);
  });
});
