import { describe, it, expect } from 'vitest';
import {
  deepIndirect,
  defineStruct,
  elemOf,
  fieldsOf,
  isTypeDescriptor,
  registeredTypeOf,
  sample,
  t,
  typeDisplayName,
  typeOfClass,
} from '../descriptor.js';

describe('type descriptors', () => {
  it('describes composite types for messages', () => {
    const user = t.struct('User', [], { module: 'app/models' });

    expect(typeDisplayName(t.pointer(t.array(user)))).toBe(
      'app/models.User[] | null'
    );
    expect(typeDisplayName(t.map(t.integer()))).toBe('Record<string, integer>');
    expect(typeDisplayName(t.namedCollection('array', 'Tags', t.string()))).toBe(
      'Tags'
    );
    expect(typeDisplayName(t.string())).toBe('string');
  });

  it('strips every pointer layer', () => {
    const base = t.integer();
    expect(deepIndirect(t.pointer(t.pointer(base)))).toBe(base);
  });

  it('resolves lazy elements and fields', () => {
    const node = t.struct('Node', () => [t.field('Next', () => t.pointer(node))]);
    const fields = fieldsOf(node);

    expect(fields.map((f) => f.name)).toEqual(['Next']);
    expect(elemOf(t.array(() => t.boolean())).kind).toBe('boolean');
    expect(elemOf(t.pointer(t.string())).kind).toBe('string');
  });

  it('recognizes descriptors only', () => {
    expect(isTypeDescriptor(t.string())).toBe(true);
    expect(isTypeDescriptor({ kind: 'tuple' })).toBe(false);
    expect(isTypeDescriptor(sample(t.string(), 'a'))).toBe(false);
    expect(isTypeDescriptor('string')).toBe(false);
  });

  it('named types keep the base shape', () => {
    const status = t.named('Status', t.string('uuid'), { module: 'app' });
    expect(status).toMatchObject({
      kind: 'string',
      name: 'Status',
      module: 'app',
      format: 'uuid',
    });
  });

  it('names embedded fields after their type', () => {
    const base = t.struct('Base', []);
    expect(t.embed(base).name).toBe('Base');
    expect(t.embed(() => base).name).toBe('embedded');
    expect(t.embed(t.pointer(base)).embedded).toBe(true);
  });
});

describe('class registry', () => {
  class Animal {
    name = '';
  }
  class Dog extends Animal {}
  class Unregistered {}

  const animal = defineStruct(Animal, [
    t.field('name', t.string(), { json: 'name' }),
  ]);

  it('registers the class name and prototype', () => {
    expect(animal.name).toBe('Animal');
    expect(animal.proto).toBe(Animal.prototype);
    expect(typeOfClass(Animal)).toBe(animal);
  });

  it('finds the descriptor through the prototype chain', () => {
    expect(registeredTypeOf(new Dog())).toBe(animal);
    expect(registeredTypeOf(new Unregistered())).toBeUndefined();
    expect(registeredTypeOf({})).toBeUndefined();
  });
});
