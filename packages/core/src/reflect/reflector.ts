/* eslint-disable max-lines */
/**
 * Type walker
 *
 * Reflects a sample into a draft-07 schema. Each type goes through the
 * same sequence:
 *   1. sample resolution, identity and definition name, type mapping
 *   2. pre-expansion hooks (enumerations, exposers, user interceptors)
 *   3. known reference or cycle reference
 *   4. title/description, composition keywords, kind dispatch
 *   5. post-expansion hooks, then the Preparer capability
 *   6. inline or register as a shared definition
 *
 * Properties additionally go through nullability, tag constraints and
 * property interceptors before they are placed in their parent.
 */

import { ErrorCode } from '../errors/codes.js';
import {
  deepIndirect,
  elemOf,
  fieldsOf,
  resolveType,
  sample,
  typeDisplayName,
  type FieldDescriptor,
  type TypeDescriptor,
} from '../types/descriptor.js';
import {
  ConfigError,
  ErrSkipProperty,
  HookError,
  isReflectError,
  isSkipProperty,
  UnsupportedTypeError,
  type ReflectError,
} from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { Ref, Schema, type SchemaOrBool } from '../types/schema.js';
import { moduleBase, toCamel, upperFirst } from '../util/naming.js';
import { decodeRawSchema } from '../util/raw-schema.js';
import {
  descriptionOf,
  enumOf,
  exposedSchema,
  exposedSchemaBytes,
  ignoresTypeName,
  isEmbedReferencer,
  isSchemaInliner,
  prepare,
  titleOf,
  XEnumNames,
  type CapabilityTarget,
} from './capabilities.js';
import { applySubSchemas } from './composer.js';
import { ReflectContext, SKIP_OUTSIDE_PROPERTY } from './context.js';
import type { ExpansionSlot } from './cycles.js';
import type { TypeKey } from './definitions.js';
import type { InterceptSchemaParams } from './hooks.js';
import { resolveNullability } from './nullability.js';
import type { ReflectOption } from './options.js';
import {
  findEmbeddedCollection,
  firstElement,
  isDynamic,
  readField,
  resolveSample,
  structKey,
  typeKey,
} from './sample.js';
import { Struct } from './struct.js';
import {
  lookupTag,
  populateFromTags,
  readBoolTag,
  readEnumTag,
  readExamplesTag,
  readLiteralTag,
} from './tags.js';

/** What the walker knows about the type being expanded */
interface Subject {
  key: TypeKey;
  defName: string;
  type: TypeDescriptor;
  value: unknown;
  struct?: Struct;
}

/** A field about to become a property */
interface FieldSource {
  field: FieldDescriptor;
  declared: TypeDescriptor;
  /** What the walker receives for the field */
  input: unknown;
  value: unknown;
}

export class Reflector {
  /** Applied to every run before the options of the call */
  defaultOptions: ReflectOption[] = [];

  private readonly typeMappings = new Map<TypeKey, unknown>();
  private readonly inlined = new Set<TypeKey>();

  /**
   * Reflects values of src's type as dst. A dst implementing
   * `ignoreTypeName` (any Schema) keeps src's identity and definition name.
   */
  addTypeMapping(src: unknown, dst: unknown): void {
    const resolved = resolveSample(src, new ReflectContext());
    if (resolved.struct) {
      throw new ConfigError({
        message: 'a virtual struct cannot be the source of a type mapping',
      });
    }
    this.typeMappings.set(typeKey(deepIndirect(resolved.type)), dst);
  }

  /** Never emit a shared definition for the sample's type */
  inlineDefinition(src: unknown): void {
    if (src instanceof Struct && src.defName === '') {
      throw new ConfigError({
        message: 'an unnamed virtual struct has no stable identity to inline',
      });
    }
    const rc = new ReflectContext();
    const resolved = resolveSample(src, rc);
    this.inlined.add(
      resolved.struct
        ? structKey(resolved.struct, rc)
        : typeKey(deepIndirect(resolved.type))
    );
  }

  reflect(
    value: unknown,
    ...options: ReflectOption[]
  ): Result<Schema, ReflectError> {
    const rc = new ReflectContext();
    rc.hooks.schema.push(checkSchemaSetup);

    try {
      for (const option of [...this.defaultOptions, ...options]) option(rc);

      const schema = this.walk(value, rc);
      this.emitDefinitions(schema, rc);
      return ok(schema);
    } catch (error) {
      if (isReflectError(error)) return err(error);
      if (isSkipProperty(error)) {
        return err(new HookError({ path: '', message: SKIP_OUTSIDE_PROPERTY }));
      }
      throw error;
    }
  }

  private emitDefinitions(root: Schema, rc: ReflectContext): void {
    const entries = rc.definitions.entries();
    if (entries.length === 0) return;

    const collect = rc.config.collectDefinitions;
    if (collect) {
      for (const [name, schema] of entries) collect(name, schema);
      return;
    }

    const definitions: Record<string, SchemaOrBool> = {};
    for (const [name, schema] of entries) definitions[name] = schema;
    root.definitions = definitions;
  }

  // ---------------------------------------------------------------------------
  // types

  private walk(input: unknown, rc: ReflectContext, parent?: Schema): Schema {
    const resolved = resolveSample(input, rc);
    const declared = resolved.type;
    const schema = new Schema();
    schema.reflectType = declared;
    schema.parent = parent;

    const subject = this.identify(resolved.type, resolved.value, resolved.struct, rc);
    if (subject === undefined) return schema;

    if (!rc.config.skipEmbeddedMapsSlices) {
      const embedded = findEmbeddedCollection(subject.type);
      if (embedded) {
        subject.value = readField(subject.value, embedded.name) ?? subject.value;
        subject.type = deepIndirect(resolveType(embedded.type));
        subject.struct = undefined;
      }
    }

    const stopped = rc.guard(() =>
      rc.hooks.runSchema(this.schemaParams(rc, subject, schema, false))
    );
    if (stopped) return this.finish(schema, rc, subject, false);

    const known = rc.definitions.refOf(subject.key);
    if (known) return this.finish(known.toSchema(), rc, subject, false);

    const active = rc.cycles.lookup(subject.key);
    if (active) return this.cycleReference(active, rc);

    if (!this.needsSlot(subject)) {
      this.expand(schema, rc, subject);
      return this.finish(schema, rc, subject, false);
    }

    const slot: ExpansionSlot = {
      key: subject.key,
      type: subject.type,
      defName: subject.defName,
      isRoot: rc.isRoot,
      referenced: false,
    };
    rc.cycles.expand(slot, () => this.expand(schema, rc, subject));
    subject.defName = slot.defName;
    return this.finish(schema, rc, subject, slot.referenced);
  }

  /**
   * Identity and definition name of the sample, after type mapping.
   * Undefined for a dynamic type without a value, which reflects as `{}`.
   */
  private identify(
    declared: TypeDescriptor,
    value: unknown,
    struct: Struct | undefined,
    rc: ReflectContext
  ): Subject | undefined {
    const type = deepIndirect(declared);
    if (isDynamic(type)) return undefined;

    if (struct) {
      return {
        key: structKey(struct, rc),
        defName: this.claim(rc, structKey(struct, rc), type.name ?? ''),
        type,
        value,
        struct,
      };
    }

    const key = typeKey(type);
    const mapped = this.typeMappings.get(key);
    if (mapped === undefined) {
      return { key, defName: this.defName(rc, key, type, value), type, value };
    }

    const target = resolveSample(mapped, rc);
    const targetType = deepIndirect(target.type);
    if (ignoresTypeName(mapped)) {
      return {
        key,
        defName: this.defName(rc, key, type, value),
        type: targetType,
        value: target.value,
        struct: target.struct,
      };
    }
    const targetKey = target.struct
      ? structKey(target.struct, rc)
      : typeKey(targetType);
    return {
      key: targetKey,
      defName: target.struct
        ? this.claim(rc, targetKey, targetType.name ?? '')
        : this.defName(rc, targetKey, targetType, target.value),
      type: targetType,
      value: target.value,
      struct: target.struct,
    };
  }

  private defName(
    rc: ReflectContext,
    key: TypeKey,
    type: TypeDescriptor,
    value: unknown
  ): string {
    if (type.name === undefined || type.name === '') return '';
    if (type.kind === 'function' || type.kind === 'symbol') return '';
    if (isSchemaInliner({ value, type })) return '';

    const preferred = rc.guard(() =>
      rc.hooks.runDefName(type, baseDefName(type))
    );
    return this.claim(rc, key, preferred);
  }

  private claim(rc: ReflectContext, key: TypeKey, preferred: string): string {
    if (preferred === '') return '';
    const claim = rc.definitions.claimName(key, (attempt) =>
      attempt === 1 ? preferred : `${preferred}Type${attempt}`
    );
    if (claim.renamed) {
      rc.note('DEFINITION_RENAMED', { preferred, name: claim.name });
    }
    return claim.name;
  }

  /** Types that can recur: named ones and every container */
  private needsSlot(subject: Subject): boolean {
    if (subject.defName !== '') return true;
    const kind = subject.type.kind;
    return kind === 'struct' || kind === 'array' || kind === 'map';
  }

  private cycleReference(slot: ExpansionSlot, rc: ReflectContext): Schema {
    if (slot.isRoot && !rc.config.rootRef) {
      rc.note('CYCLE_REFERENCE', { ref: '#' });
      return new Ref('#', '').toSchema();
    }
    if (slot.defName === '') {
      // Inline-only named types keep their own name once they recur
      const preferred =
        slot.type.name !== undefined && slot.type.name !== ''
          ? rc.guard(() => rc.hooks.runDefName(slot.type, baseDefName(slot.type)))
          : `struct${rc.nextAnonymousIndex()}`;
      slot.defName = this.claim(rc, slot.key, preferred);
    }
    slot.referenced = true;
    const ref = new Ref(rc.config.definitionsPrefix, slot.defName);
    rc.note('CYCLE_REFERENCE', { ref: ref.toString() });
    return ref.toSchema();
  }

  private schemaParams(
    rc: ReflectContext,
    subject: Subject,
    schema: Schema,
    processed: boolean
  ): InterceptSchemaParams {
    return {
      context: rc,
      value: subject.value,
      type: subject.type,
      schema,
      processed,
    };
  }

  private expand(schema: Schema, rc: ReflectContext, subject: Subject): void {
    const target: CapabilityTarget = { value: subject.value, type: subject.type };

    rc.guard(() => {
      const description = descriptionOf(target);
      if (description !== undefined) schema.description = description;
      const title = titleOf(target);
      if (title !== undefined) schema.title = title;
    });
    if (subject.struct?.description !== undefined) {
      schema.description = subject.struct.description;
    }
    if (subject.struct?.title !== undefined) {
      schema.title = subject.struct.title;
    }

    applySubSchemas(target, schema, rc, (item) => this.walk(item, rc, schema));
    this.dispatch(schema, rc, subject);

    const stopped = rc.guard(() =>
      rc.hooks.runSchema(this.schemaParams(rc, subject, schema, true))
    );
    if (stopped) return;

    rc.guard(() => prepare(target, schema));
  }

  private dispatch(schema: Schema, rc: ReflectContext, subject: Subject): void {
    const { type, value } = subject;

    switch (type.kind) {
      case 'struct':
        schema.addType('object');
        this.walkProperties(type, value, subject.struct, schema, rc);
        break;
      case 'array': {
        const elem = elemOf(type);
        const item = Array.isArray(value) ? value[0] : undefined;
        const items = rc.enter('[]', () =>
          this.walk(sample(elem, item), rc, schema)
        );
        schema.addType('array');
        schema.items = elementNullability(items, elem);
        break;
      }
      case 'map': {
        const elem = elemOf(type);
        const item = Array.isArray(value) ? undefined : firstElement(value);
        const values = rc.enter('{}', () =>
          this.walk(sample(elem, item), rc, schema)
        );
        schema.addType('object');
        schema.additionalProperties = elementNullability(values, elem);
        break;
      }
      case 'boolean':
        schema.addType('boolean');
        break;
      case 'integer':
        schema.addType('integer');
        break;
      case 'unsigned':
        schema.addType('integer');
        schema.minimum = 0;
        break;
      case 'number':
        schema.addType('number');
        break;
      case 'string':
        schema.addType('string');
        if (type.format !== undefined) schema.format = type.format;
        if (type.examples !== undefined) schema.examples = [...type.examples];
        break;
      case 'unknown':
      case 'raw':
        break;
      default:
        this.unsupported(rc, type);
    }
  }

  private unsupported(rc: ReflectContext, type: TypeDescriptor): never {
    if (rc.config.skipUnsupportedProperties && rc.inProperty) {
      throw ErrSkipProperty;
    }
    throw new UnsupportedTypeError({
      path: rc.errorPath(),
      typeName: typeDisplayName(type),
    });
  }

  private finish(
    schema: Schema,
    rc: ReflectContext,
    subject: Subject,
    referenced: boolean
  ): Schema {
    const { config } = rc;
    if (rc.isRoot && (config.rootNullable || subject.struct?.nullable)) {
      schema.addType('null');
    }
    if (schema.$ref !== undefined) return schema;
    if (!referenced && this.keepsInline(schema, rc, subject)) return schema;

    const ref = new Ref(config.definitionsPrefix, subject.defName);
    rc.definitions.register(subject.key, ref, schema);

    const out = ref.toSchema();
    out.reflectType = schema.reflectType;
    out.parent = schema.parent;
    return out;
  }

  private keepsInline(
    schema: Schema,
    rc: ReflectContext,
    subject: Subject
  ): boolean {
    const { config } = rc;
    if (config.inlineRefs || this.inlined.has(subject.key)) return true;
    if (rc.isRoot && !config.rootRef) return true;
    if (subject.defName === '') return true;
    return (
      schema.type !== undefined &&
      !schema.hasType('object') &&
      !schema.hasType('array') &&
      schema.isTrivial(rc.resolveRef)
    );
  }

  // ---------------------------------------------------------------------------
  // properties

  private walkProperties(
    type: TypeDescriptor,
    value: unknown,
    struct: Struct | undefined,
    parent: Schema,
    rc: ReflectContext
  ): void {
    fieldsOf(type).forEach((field, index) => {
      const declared = resolveType(field.type);
      if (struct) {
        const fieldValue = struct.fields[index]?.value;
        this.walkField(
          { field, declared, input: fieldValue, value: fieldValue },
          value,
          parent,
          rc
        );
        return;
      }
      const fieldValue = readField(value, field.name);
      this.walkField(
        { field, declared, input: sample(declared, fieldValue), value: fieldValue },
        value,
        parent,
        rc
      );
    });
  }

  private propertyTag(
    rc: ReflectContext,
    field: FieldDescriptor
  ): { tag: string; found: boolean } {
    const { propertyNameMapping, propertyNameTag, propertyNameAdditionalTags } =
      rc.config;
    for (const candidate of [
      lookupTag(propertyNameMapping, field.name),
      lookupTag(field.tags, propertyNameTag),
      ...propertyNameAdditionalTags.map((key) => lookupTag(field.tags, key)),
    ]) {
      if (candidate !== undefined) return { tag: candidate, found: true };
    }
    return { tag: '', found: false };
  }

  private walkField(
    source: FieldSource,
    parentValue: unknown,
    parent: Schema,
    rc: ReflectContext
  ): void {
    const { field, declared } = source;
    const { tag, found } = this.propertyTag(rc, field);
    if (tag === '-') return;

    if (field.embedded && tag === '' && deepIndirect(declared).kind === 'struct') {
      this.walkEmbedded(source, parentValue, parent, rc);
      return;
    }

    if (field.name === '_' && (!rc.config.unnamedFieldWithTag || found)) {
      this.configureParent(field, parent, rc);
      return;
    }

    if (rc.config.requireNameTag && !found) return;

    const propName = tag.split(',')[0] || field.name;
    const omitEmpty = tag.includes(',omitempty');
    const path = rc.errorPath(propName);
    const required = readBoolTag(field.tags, 'required', path) ?? false;
    const nullable = readBoolTag(field.tags, 'nullable', path);

    const property = rc.enter(propName, () =>
      this.reflectProperty(source, propName, omitEmpty, nullable, parent, rc)
    );
    if (property === undefined) return;

    parent.properties = { ...(parent.properties ?? {}), [propName]: property };
    if (required) parent.addRequired(propName);
  }

  /** Flattens the embedded struct's fields, or references it via allOf */
  private walkEmbedded(
    source: FieldSource,
    parentValue: unknown,
    parent: Schema,
    rc: ReflectContext
  ): void {
    const { field, declared } = source;
    const type = deepIndirect(declared);
    const value = source.value ?? parentValue;
    const refer = lookupTag(field.tags, 'refer');
    const referenced =
      refer === 'true' ||
      ((refer === undefined || refer === '') &&
        isEmbedReferencer({ value, type }));

    if (!referenced) {
      this.walkProperties(type, value, undefined, parent, rc);
      return;
    }

    const schema = rc.enter('', () =>
      this.walk(sample(declared, value), rc, parent)
    );
    parent.allOf = [...(parent.allOf ?? []), schema];
  }

  /** `_` fields carry keywords of the enclosing object */
  private configureParent(
    field: FieldDescriptor,
    parent: Schema,
    rc: ReflectContext
  ): void {
    const path = rc.errorPath(field.name);
    populateFromTags(parent, field.tags, path);

    const additional = readBoolTag(field.tags, 'additionalProperties', path);
    if (additional !== undefined) parent.additionalProperties = additional;

    if (!rc.config.skipNonConstraints) {
      applyExamples(parent, field, parent, path, rc);
    }
  }

  private reflectProperty(
    source: FieldSource,
    name: string,
    omitEmpty: boolean,
    nullable: boolean | undefined,
    parent: Schema,
    rc: ReflectContext
  ): Schema | undefined {
    const path = rc.errorPath();

    try {
      return rc.withinProperty(() =>
        this.placeProperty(source, name, omitEmpty, nullable, parent, rc, path)
      );
    } catch (error) {
      if (!isSkipProperty(error)) throw error;
      rc.note('PROPERTY_SKIPPED', { property: name });
      return undefined;
    }
  }

  private placeProperty(
    source: FieldSource,
    name: string,
    omitEmpty: boolean,
    nullable: boolean | undefined,
    parent: Schema,
    rc: ReflectContext,
    path: string
  ): Schema {
    const { field, declared, input } = source;
    rc.guard(() =>
      rc.hooks.runProp({
        context: rc,
        path: [...rc.path],
        name,
        field,
        parentSchema: parent,
        processed: false,
      })
    );

    const schema = this.walk(input, rc, parent);
    const typeSource =
      (schema.$ref === undefined ? undefined : rc.getDefinition(schema.$ref)) ??
      schema;

    resolveNullability(schema, rc, {
      type: declared,
      omitEmpty,
      nullable,
      optional:
        declared.kind === 'pointer' || (input instanceof Struct && input.nullable),
    });

    const { tags } = field;
    if (!rc.config.skipNonConstraints) {
      const value = readLiteralTag(tags, 'default', typeSource, rc.resolveRef, path);
      if (value !== undefined) schema.default = value;
    }
    const constant = readLiteralTag(tags, 'const', typeSource, rc.resolveRef, path);
    if (constant !== undefined) schema.const = constant;

    populateFromTags(schema, tags, path);
    if (readBoolTag(tags, 'deprecated', path)) {
      schema.setExtraProperty('deprecated', true);
    }
    if (!rc.config.skipNonConstraints) {
      applyExamples(schema, field, typeSource, path, rc);
    }
    const values = readEnumTag(tags);
    if (values !== undefined) schema.enum = values;

    wrapReference(schema, rc);

    rc.guard(() =>
      rc.hooks.runProp({
        context: rc,
        path: [...rc.path],
        name,
        field,
        propertySchema: schema,
        parentSchema: parent,
        processed: true,
      })
    );
    return schema;
  }
}

/**
 * Definition name of a named type: camel-cased last module segment plus
 * the type name, with generic arguments as `[Arg1,Arg2]`.
 */
export function baseDefName(type: TypeDescriptor): string {
  const args = (type.typeArgs ?? []).map((arg) =>
    arg.name === undefined ? typeDisplayName(arg) : baseDefName(arg)
  );
  const name = args.length > 0
    ? `${type.name ?? ''}[${args.join(',')}]`
    : (type.name ?? '');
  if (type.module === undefined || type.module === '' || type.module === 'main') {
    return upperFirst(name);
  }
  return toCamel(moduleBase(type.module)) + upperFirst(name);
}

/** Items and map values of pointer elements accept null */
function elementNullability(schema: Schema, elem: TypeDescriptor): Schema {
  if (
    elem.kind === 'pointer' &&
    schema.$ref === undefined &&
    schema.type !== undefined &&
    deepIndirect(elem).kind !== 'raw'
  ) {
    schema.prependType('null');
  }
  return schema;
}

function applyExamples(
  schema: Schema,
  field: FieldDescriptor,
  typeSource: Schema,
  path: string,
  rc: ReflectContext
): void {
  const example = readLiteralTag(
    field.tags,
    'example',
    typeSource,
    rc.resolveRef,
    path
  );
  if (example !== undefined) schema.examples = [example];

  const examples = readExamplesTag(field.tags, path);
  if (examples !== undefined) {
    schema.examples = [...(schema.examples ?? []), ...examples];
  }
}

/** Keywords that cannot sit beside $ref move the reference into allOf */
function wrapReference(schema: Schema, rc: ReflectContext): void {
  if (schema.$ref === undefined || schema.isPureReference()) return;
  rc.note('REFERENCE_WRAPPED', { ref: schema.$ref });
  const ref = new Schema({ $ref: schema.$ref });
  schema.$ref = undefined;
  schema.allOf = [ref, ...(schema.allOf ?? [])];
}

/**
 * Built-in first stage of the pre-expansion hooks: value enumerations,
 * then Exposer and RawExposer, which replace default reflection.
 */
function checkSchemaSetup(params: InterceptSchemaParams): boolean {
  if (params.processed) return false;
  const { context: rc, schema } = params;
  const target: CapabilityTarget = { value: params.value, type: params.type };

  const values = enumOf(target);
  if (values !== undefined && values.items.length > 0) {
    schema.enum = values.items;
    if (values.names !== undefined && values.names.length > 0) {
      schema.setExtraProperty(XEnumNames, values.names);
    }
  }

  const exposed = exposedSchema(target);
  if (exposed) {
    schema.replaceWith(exposed);
    return true;
  }

  const raw = exposedSchemaBytes(target);
  if (raw === undefined) return false;

  const decoded = decodeRawSchema(raw);
  if (decoded._tag === 'Err') {
    throw new HookError({
      path: rc.errorPath(),
      message: `invalid raw schema: ${decoded.error}`,
      errorCode: ErrorCode.RAW_SCHEMA_INVALID,
    });
  }
  schema.replaceWith(fromSchemaOrBool(decoded.value));
  return true;
}

function fromSchemaOrBool(value: SchemaOrBool): Schema {
  if (value === true) return new Schema();
  if (value === false) return new Schema({ not: new Schema() });
  return value;
}

const defaultReflector = new Reflector();

/** Reflects with a reflector that has no mappings and no default options */
export function reflect(
  value: unknown,
  ...options: ReflectOption[]
): Result<Schema, ReflectError> {
  return defaultReflector.reflect(value, ...options);
}

/**
 * Declared field name → property name map for a struct type, from the
 * given metadata key. Embedded structs contribute their fields.
 */
export function makePropertyNameMapping(
  src: unknown,
  tag: string
): Record<string, string> {
  const type = deepIndirect(resolveSample(src, new ReflectContext()).type);
  const mapping: Record<string, string> = {};
  collectTaggedFields(type, tag, mapping);
  return mapping;
}

function collectTaggedFields(
  type: TypeDescriptor,
  tag: string,
  into: Record<string, string>
): void {
  for (const field of fieldsOf(type)) {
    const value = lookupTag(field.tags, tag);
    const fieldType = deepIndirect(resolveType(field.type));
    if (field.embedded && value === undefined && fieldType.kind === 'struct') {
      collectTaggedFields(fieldType, tag, into);
      continue;
    }
    if (value === undefined || value === '' || value === '-') continue;
    into[field.name] = value.split(',')[0];
  }
}
