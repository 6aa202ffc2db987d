/**
 * Configuration mutators
 *
 * Options are applied in order to a fresh context before traversal: the
 * reflector's defaults first, then the options of the call.
 */

import { ConfigError } from '../types/errors.js';
import type { Schema } from '../types/schema.js';
import type { ReflectContext, ReflectNote } from './context.js';
import type {
  InterceptDefNameFunc,
  InterceptNullabilityFunc,
  InterceptPropFunc,
  InterceptSchemaFunc,
} from './hooks.js';

export type ReflectOption = (rc: ReflectContext) => void;

/** Deliver definitions to f instead of embedding them in the result */
export function collectDefinitions(
  f: (name: string, schema: Schema) => void
): ReflectOption {
  return (rc) => {
    rc.config.collectDefinitions = f;
  };
}

export function definitionsPrefix(prefix: string): ReflectOption {
  return (rc) => {
    if (prefix === '') {
      throw new ConfigError({ message: 'definitions prefix must not be empty' });
    }
    rc.config.definitionsPrefix = prefix;
  };
}

/** Primary field metadata key for property names, plus fallbacks */
export function propertyNameTag(
  tag: string,
  ...additional: string[]
): ReflectOption {
  return (rc) => {
    rc.config.propertyNameTag = tag;
    rc.config.propertyNameAdditionalTags = [...additional];
  };
}

/** Declared field name → property name, consulted before metadata */
export function propertyNameMapping(
  mapping: Readonly<Record<string, string>>
): ReflectOption {
  return (rc) => {
    rc.config.propertyNameMapping = { ...mapping };
  };
}

export function interceptSchema(f: InterceptSchemaFunc): ReflectOption {
  return (rc) => {
    rc.hooks.schema.push(f);
  };
}

export function interceptProp(f: InterceptPropFunc): ReflectOption {
  return (rc) => {
    rc.hooks.prop.push(f);
  };
}

export function interceptNullability(
  f: InterceptNullabilityFunc
): ReflectOption {
  return (rc) => {
    rc.hooks.nullability.push(f);
  };
}

export function interceptDefName(f: InterceptDefNameFunc): ReflectOption {
  return (rc) => {
    rc.hooks.defName.push(f);
  };
}

/**
 * Removes the first matching prefix from definition names, including the
 * names of generic type arguments.
 */
export function stripDefinitionNamePrefix(...prefixes: string[]): ReflectOption {
  return interceptDefName((_type, defaultDefName) => {
    for (const prefix of prefixes) {
      if (prefix === '') continue;
      const stripped = (
        defaultDefName.startsWith(prefix)
          ? defaultDefName.slice(prefix.length)
          : defaultDefName
      )
        .split(`[${prefix}`)
        .join('[')
        .split(`,${prefix}`)
        .join(',');
      if (stripped !== defaultDefName) return stripped;
    }
    return defaultDefName;
  });
}

/** Receive diagnostic notes as they are recorded */
export function collectNotes(f: (note: ReflectNote) => void): ReflectOption {
  return (rc) => {
    rc.noteListeners.push(f);
  };
}

export const inlineRefs: ReflectOption = (rc) => {
  rc.config.inlineRefs = true;
};

export const rootRef: ReflectOption = (rc) => {
  rc.config.rootRef = true;
};

export const rootNullable: ReflectOption = (rc) => {
  rc.config.rootNullable = true;
};

export const requireNameTag: ReflectOption = (rc) => {
  rc.config.requireNameTag = true;
};

export const skipEmbeddedMapsSlices: ReflectOption = (rc) => {
  rc.config.skipEmbeddedMapsSlices = true;
};

export const skipUnsupportedProperties: ReflectOption = (rc) => {
  rc.config.skipUnsupportedProperties = true;
};

export const skipNonConstraints: ReflectOption = (rc) => {
  rc.config.skipNonConstraints = true;
};

export const envelopNullability: ReflectOption = (rc) => {
  rc.config.envelopNullability = true;
};

export const unnamedFieldWithTag: ReflectOption = (rc) => {
  rc.config.unnamedFieldWithTag = true;
};
