import { MaterialAttributeType } from './material-attribute-type';

/**
 * Well-known material attribute names. A record stores one of these as a
 * single byte; anything else is stored as its UTF-8 text.
 */
export enum MaterialAttribute {
  /** Alpha mask threshold, Float. Renderers may fall back to it when blending is unavailable. */
  AlphaMask = 0,
  /** Render with blending and in depth order, Bool. Opaque if false or absent. */
  AlphaBlend = 1,
  /** Bool, false if absent. */
  DoubleSided = 2,

  /** Phong ambient color, Vector4. Multiplied with AmbientTexture if both are present. */
  AmbientColor = 3,
  /** Phong ambient texture index, UnsignedInt. */
  AmbientTexture = 4,
  /** Ambient texture coordinate set, UnsignedInt. Overrides CoordinateSet. */
  AmbientCoordinateSet = 5,
  /** Ambient texture transform, Matrix3x3. Overrides TextureMatrix. */
  AmbientTextureMatrix = 6,

  DiffuseColor = 7,
  DiffuseTexture = 8,
  DiffuseCoordinateSet = 9,
  DiffuseTextureMatrix = 10,

  SpecularColor = 11,
  SpecularTexture = 12,
  SpecularCoordinateSet = 13,
  SpecularTextureMatrix = 14,

  /** Tangent-space normal map texture index, UnsignedInt. */
  NormalTexture = 15,
  NormalCoordinateSet = 16,
  NormalTextureMatrix = 17,

  /** Coordinate set shared by all textures, UnsignedInt. */
  CoordinateSet = 18,
  /** Transform shared by all textures, Matrix3x3. */
  TextureMatrix = 19,

  /** Phong shininess, Float. */
  Shininess = 20,
}

/** A well-known attribute or a free-form text name. */
export type MaterialAttributeName = MaterialAttribute | string;

/** Documented value type of each well-known attribute. */
export const MATERIAL_ATTRIBUTE_TYPES: Record<MaterialAttribute, MaterialAttributeType> = {
  [MaterialAttribute.AlphaMask]: MaterialAttributeType.Float,
  [MaterialAttribute.AlphaBlend]: MaterialAttributeType.Bool,
  [MaterialAttribute.DoubleSided]: MaterialAttributeType.Bool,
  [MaterialAttribute.AmbientColor]: MaterialAttributeType.Vector4,
  [MaterialAttribute.AmbientTexture]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.AmbientCoordinateSet]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.AmbientTextureMatrix]: MaterialAttributeType.Matrix3x3,
  [MaterialAttribute.DiffuseColor]: MaterialAttributeType.Vector4,
  [MaterialAttribute.DiffuseTexture]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.DiffuseCoordinateSet]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.DiffuseTextureMatrix]: MaterialAttributeType.Matrix3x3,
  [MaterialAttribute.SpecularColor]: MaterialAttributeType.Vector4,
  [MaterialAttribute.SpecularTexture]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.SpecularCoordinateSet]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.SpecularTextureMatrix]: MaterialAttributeType.Matrix3x3,
  [MaterialAttribute.NormalTexture]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.NormalCoordinateSet]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.NormalTextureMatrix]: MaterialAttributeType.Matrix3x3,
  [MaterialAttribute.CoordinateSet]: MaterialAttributeType.UnsignedInt,
  [MaterialAttribute.TextureMatrix]: MaterialAttributeType.Matrix3x3,
  [MaterialAttribute.Shininess]: MaterialAttributeType.Float,
};

export function isMaterialAttribute(value: number): value is MaterialAttribute {
  return Object.prototype.hasOwnProperty.call(MATERIAL_ATTRIBUTE_TYPES, value);
}

/** Canonical string of a well-known attribute, e.g. `"DiffuseColor"`. */
export function materialAttributeName(attribute: MaterialAttribute): string {
  return MaterialAttribute[attribute];
}

const ATTRIBUTES_BY_NAME = new Map<string, MaterialAttribute>();
for (const key of Object.keys(MATERIAL_ATTRIBUTE_TYPES)) {
  const attribute = Number(key);
  if (isMaterialAttribute(attribute)) {
    ATTRIBUTES_BY_NAME.set(materialAttributeName(attribute), attribute);
  }
}

/** Well-known attribute spelled exactly `name`, if any. Case-sensitive. */
export function materialAttributeFromName(name: string): MaterialAttribute | undefined {
  return ATTRIBUTES_BY_NAME.get(name);
}

/** Resolve a name to its canonical form: well-known spellings become the enum. */
export function resolveAttributeName(name: MaterialAttributeName): MaterialAttributeName {
  if (typeof name === 'string') return materialAttributeFromName(name) ?? name;
  return name;
}

/** Canonical string for either name form, used as the lookup key. */
export function attributeNameKey(name: MaterialAttributeName): string {
  return typeof name === 'string' ? name : materialAttributeName(name);
}
