import { MaterialAttributeError } from './errors';
import {
  MaterialAttributeType,
  isMaterialAttributeType,
  materialAttributeTypeLayout,
} from './material-attribute-type';

/** Types whose values are carried as tagged components instead of a bare JS primitive. */
export type TaggedAttributeType = Exclude<MaterialAttributeType, MaterialAttributeType.Bool | MaterialAttributeType.Float>;

/**
 * A value of a type that a bare `number` can't describe on its own: integers,
 * vectors and matrices. Matrix components are column-major.
 */
export interface TaggedAttributeValue<T extends TaggedAttributeType = TaggedAttributeType> {
  readonly type: T;
  readonly components: readonly number[];
}

/**
 * Every value a record can hold. `boolean` is Bool, `number` is Float, the
 * rest comes from the factories below. Doubles, 4×4 matrices, 8/16-bit
 * integers and strings have no member here and don't compile.
 */
export type AttributeValue = boolean | number | TaggedAttributeValue;

/** Type tag selected by the static kind of `V`. */
export type AttributeTypeFor<V extends AttributeValue> =
  V extends boolean ? MaterialAttributeType.Bool
  : V extends number ? MaterialAttributeType.Float
  : V extends TaggedAttributeValue<infer T> ? T
  : never;

/** What reading a record of type `T` back produces. */
export type AttributeValueFor<T extends MaterialAttributeType> =
  T extends MaterialAttributeType.Bool ? boolean
  : T extends MaterialAttributeType.Float ? number
  : T extends TaggedAttributeType ? TaggedAttributeValue<T>
  : never;

const U32_MAX = 0xFFFFFFFF;
const I32_MIN = -0x80000000;
const I32_MAX = 0x7FFFFFFF;

function checkComponent(type: MaterialAttributeType, value: number, index: number): void {
  const { scalar } = materialAttributeTypeLayout(type);
  if (scalar === 'f32') {
    if (typeof value !== 'number') {
      throw new MaterialAttributeError('InvalidValue', `${MaterialAttributeType[type]} component ${index} is not a number`);
    }
    if (Number.isFinite(value) && !Number.isFinite(Math.fround(value))) {
      throw new MaterialAttributeError('InvalidValue', `${MaterialAttributeType[type]} component ${index} overflows 32-bit float: ${value}`);
    }
    return;
  }
  if (!Number.isInteger(value)) {
    throw new MaterialAttributeError('InvalidValue', `${MaterialAttributeType[type]} component ${index} must be an integer, got ${value}`);
  }
  const [min, max] = scalar === 'u32' ? [0, U32_MAX] : [I32_MIN, I32_MAX];
  if (value < min || value > max) {
    throw new MaterialAttributeError('InvalidValue', `${MaterialAttributeType[type]} component ${index} out of range: ${value}`);
  }
}

/**
 * Build a tagged value, checking component count and integer ranges.
 * Prefer the named factories; this is the path for importers that only
 * know the type at run time.
 */
export function taggedValue<T extends TaggedAttributeType>(type: T, components: ArrayLike<number>): TaggedAttributeValue<T> {
  const layout = materialAttributeTypeLayout(type);
  if (layout.scalar === 'bool' || (layout.scalar === 'f32' && layout.components === 1)) {
    throw new MaterialAttributeError('UnsupportedValueKind', `${MaterialAttributeType[type]} is not a tagged value type`);
  }
  if (components.length !== layout.components) {
    throw new MaterialAttributeError(
      'InvalidValue',
      `${MaterialAttributeType[type]} needs ${layout.components} components, got ${components.length}`,
    );
  }
  const copy = Array.from(components);
  copy.forEach((c, i) => checkComponent(type, c, i));
  return Object.freeze({ type, components: Object.freeze(copy) });
}

export const uint = (value: number) => taggedValue(MaterialAttributeType.UnsignedInt, [value]);
export const int = (value: number) => taggedValue(MaterialAttributeType.Int, [value]);

export const vector2 = (x: number, y: number) => taggedValue(MaterialAttributeType.Vector2, [x, y]);
export const vector2ui = (x: number, y: number) => taggedValue(MaterialAttributeType.Vector2ui, [x, y]);
export const vector2i = (x: number, y: number) => taggedValue(MaterialAttributeType.Vector2i, [x, y]);

export const vector3 = (x: number, y: number, z: number) => taggedValue(MaterialAttributeType.Vector3, [x, y, z]);
export const vector3ui = (x: number, y: number, z: number) => taggedValue(MaterialAttributeType.Vector3ui, [x, y, z]);
export const vector3i = (x: number, y: number, z: number) => taggedValue(MaterialAttributeType.Vector3i, [x, y, z]);

export const vector4 = (x: number, y: number, z: number, w: number) =>
  taggedValue(MaterialAttributeType.Vector4, [x, y, z, w]);
export const vector4ui = (x: number, y: number, z: number, w: number) =>
  taggedValue(MaterialAttributeType.Vector4ui, [x, y, z, w]);
export const vector4i = (x: number, y: number, z: number, w: number) =>
  taggedValue(MaterialAttributeType.Vector4i, [x, y, z, w]);

// Matrices take column-major components, e.g. a Float32Array from a math library.
export const matrix2x2 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix2x2, m);
export const matrix2x3 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix2x3, m);
export const matrix2x4 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix2x4, m);
export const matrix3x2 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix3x2, m);
export const matrix3x3 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix3x3, m);
export const matrix3x4 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix3x4, m);
export const matrix4x2 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix4x2, m);
export const matrix4x3 = (m: ArrayLike<number>) => taggedValue(MaterialAttributeType.Matrix4x3, m);

export function isTaggedAttributeValue(value: unknown): value is TaggedAttributeValue {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('components' in value)) return false;
  return typeof value.type === 'number' && Array.isArray(value.components);
}

/**
 * Run-time counterpart of {@link AttributeTypeFor} for values whose static
 * kind was lost (parsed files, `unknown` plumbing). Anything outside the
 * mapping throws `UnsupportedValueKind`.
 */
export function attributeTypeFor<V extends AttributeValue>(value: V): AttributeTypeFor<V>;
export function attributeTypeFor(value: unknown): MaterialAttributeType;
export function attributeTypeFor(value: unknown): MaterialAttributeType {
  if (typeof value === 'boolean') return MaterialAttributeType.Bool;
  if (typeof value === 'number') return MaterialAttributeType.Float;
  if (isTaggedAttributeValue(value)) {
    const type: number = value.type;
    if (isMaterialAttributeType(type) && type !== MaterialAttributeType.Bool && type !== MaterialAttributeType.Float) {
      return type;
    }
    throw new MaterialAttributeError('UnsupportedValueKind', `Unsupported material attribute type ${type}`);
  }
  throw new MaterialAttributeError('UnsupportedValueKind', `Unsupported material attribute value kind: ${typeof value}`);
}

/** A value reduced to its tag and checked numeric components. Bool is 0 or 1. */
export interface FlatAttributeValue {
  readonly type: MaterialAttributeType;
  readonly components: readonly number[];
}

export function flattenAttributeValue(value: unknown): FlatAttributeValue {
  const type = attributeTypeFor(value);
  if (typeof value === 'boolean') return { type, components: [value ? 1 : 0] };
  if (typeof value === 'number') {
    checkComponent(type, value, 0);
    return { type, components: [value] };
  }
  if (!isTaggedAttributeValue(value)) {
    throw new MaterialAttributeError('UnsupportedValueKind', `Unsupported material attribute value kind: ${typeof value}`);
  }
  const { components } = materialAttributeTypeLayout(type);
  if (value.components.length !== components) {
    throw new MaterialAttributeError(
      'InvalidValue',
      `${MaterialAttributeType[type]} needs ${components} components, got ${value.components.length}`,
    );
  }
  value.components.forEach((c, i) => checkComponent(type, c, i));
  return { type, components: value.components };
}

/** Inverse of {@link flattenAttributeValue}. */
export function unflattenAttributeValue(type: MaterialAttributeType, components: readonly number[]): AttributeValue {
  switch (type) {
    case MaterialAttributeType.Bool:
      return components[0] !== 0;
    case MaterialAttributeType.Float:
      return components[0];
    default:
      return taggedValue(type, components);
  }
}
