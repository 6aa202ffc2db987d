import { describe, it, expect } from 'vitest';
import {
  createReflectConfig,
  DEFAULT_DEFINITIONS_PREFIX,
  DEFAULT_PROPERTY_NAME_TAG,
  DEFAULT_REFLECT_CONFIG,
} from '../options.js';

describe('ReflectConfig defaults', () => {
  it('uses draft-07 definitions and the json name tag', () => {
    expect(DEFAULT_DEFINITIONS_PREFIX).toBe('#/definitions/');
    expect(DEFAULT_PROPERTY_NAME_TAG).toBe('json');
    expect(DEFAULT_REFLECT_CONFIG.definitionsPrefix).toBe('#/definitions/');
    expect(DEFAULT_REFLECT_CONFIG.propertyNameTag).toBe('json');
  });

  it('turns every policy flag off', () => {
    expect(DEFAULT_REFLECT_CONFIG).toMatchObject({
      inlineRefs: false,
      rootRef: false,
      rootNullable: false,
      requireNameTag: false,
      skipEmbeddedMapsSlices: false,
      skipUnsupportedProperties: false,
      skipNonConstraints: false,
      envelopNullability: false,
      unnamedFieldWithTag: false,
    });
    expect(DEFAULT_REFLECT_CONFIG.collectDefinitions).toBeUndefined();
    expect(DEFAULT_REFLECT_CONFIG.propertyNameMapping).toBeUndefined();
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_REFLECT_CONFIG)).toBe(true);
  });

  it('createReflectConfig returns independent copies', () => {
    const a = createReflectConfig();
    const b = createReflectConfig();
    a.propertyNameAdditionalTags.push('query');
    a.inlineRefs = true;

    expect(b.propertyNameAdditionalTags).toEqual([]);
    expect(b.inlineRefs).toBe(false);
    expect(DEFAULT_REFLECT_CONFIG.propertyNameAdditionalTags).toEqual([]);
  });
});
