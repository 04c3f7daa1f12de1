import { MaterialAttributeError } from './errors';

/**
 * Storage type of a material attribute value. Stored as the first byte of
 * every record; zero is reserved for an invalid record.
 *
 * Only full 32-bit scalar types are listed. Matrix4x4 is left out because its
 * 64 bytes would not fit next to a type byte and a name.
 */
export enum MaterialAttributeType {
  Bool = 1,

  Float = 2,
  UnsignedInt = 3,
  Int = 4,

  Vector2 = 5,
  Vector2ui = 6,
  Vector2i = 7,

  Vector3 = 8,
  Vector3ui = 9,
  Vector3i = 10,

  Vector4 = 11,
  Vector4ui = 12,
  Vector4i = 13,

  Matrix2x2 = 14,
  Matrix2x3 = 15,
  Matrix2x4 = 16,

  Matrix3x2 = 17,
  Matrix3x3 = 18,
  Matrix3x4 = 19,

  Matrix4x2 = 20,
  Matrix4x3 = 21,
}

export type ScalarKind = 'bool' | 'f32' | 'u32' | 'i32';

/** Component layout of a type. Matrices are column-major, `columns` × `rows`. */
export interface MaterialAttributeTypeLayout {
  readonly scalar: ScalarKind;
  readonly components: number;
  readonly columns?: number;
  readonly rows?: number;
}

function scalar(kind: ScalarKind, components: number): MaterialAttributeTypeLayout {
  return { scalar: kind, components };
}

function matrix(columns: number, rows: number): MaterialAttributeTypeLayout {
  return { scalar: 'f32', components: columns * rows, columns, rows };
}

const TYPE_LAYOUTS: Record<MaterialAttributeType, MaterialAttributeTypeLayout> = {
  [MaterialAttributeType.Bool]: scalar('bool', 1),
  [MaterialAttributeType.Float]: scalar('f32', 1),
  [MaterialAttributeType.UnsignedInt]: scalar('u32', 1),
  [MaterialAttributeType.Int]: scalar('i32', 1),
  [MaterialAttributeType.Vector2]: scalar('f32', 2),
  [MaterialAttributeType.Vector2ui]: scalar('u32', 2),
  [MaterialAttributeType.Vector2i]: scalar('i32', 2),
  [MaterialAttributeType.Vector3]: scalar('f32', 3),
  [MaterialAttributeType.Vector3ui]: scalar('u32', 3),
  [MaterialAttributeType.Vector3i]: scalar('i32', 3),
  [MaterialAttributeType.Vector4]: scalar('f32', 4),
  [MaterialAttributeType.Vector4ui]: scalar('u32', 4),
  [MaterialAttributeType.Vector4i]: scalar('i32', 4),
  [MaterialAttributeType.Matrix2x2]: matrix(2, 2),
  [MaterialAttributeType.Matrix2x3]: matrix(2, 3),
  [MaterialAttributeType.Matrix2x4]: matrix(2, 4),
  [MaterialAttributeType.Matrix3x2]: matrix(3, 2),
  [MaterialAttributeType.Matrix3x3]: matrix(3, 3),
  [MaterialAttributeType.Matrix3x4]: matrix(3, 4),
  [MaterialAttributeType.Matrix4x2]: matrix(4, 2),
  [MaterialAttributeType.Matrix4x3]: matrix(4, 3),
};

const SCALAR_SIZES: Record<ScalarKind, number> = {
  bool: 1,
  f32: 4,
  u32: 4,
  i32: 4,
};

/** True if `value` is the byte of a real (non-zero, known) type. */
export function isMaterialAttributeType(value: number): value is MaterialAttributeType {
  return Object.prototype.hasOwnProperty.call(TYPE_LAYOUTS, value);
}

export function materialAttributeTypeLayout(type: MaterialAttributeType): MaterialAttributeTypeLayout {
  if (!isMaterialAttributeType(type)) {
    throw new MaterialAttributeError('UnsupportedValueKind', `Unknown material attribute type ${String(type)}`);
  }
  return TYPE_LAYOUTS[type];
}

/** Byte size of a value of `type`: 1 for Bool, up to 48 for Matrix3x4 / Matrix4x3. */
export function materialAttributeTypeSize(type: MaterialAttributeType): number {
  const layout = materialAttributeTypeLayout(type);
  return SCALAR_SIZES[layout.scalar] * layout.components;
}

/** Enum member name, or `Invalid(n)` for bytes that are not a type. */
export function materialAttributeTypeName(type: number): string {
  return isMaterialAttributeType(type) ? MaterialAttributeType[type] : `Invalid(${type})`;
}
