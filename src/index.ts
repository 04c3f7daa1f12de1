export {
  MaterialAttributeType,
  isMaterialAttributeType,
  materialAttributeTypeLayout,
  materialAttributeTypeName,
  materialAttributeTypeSize,
} from './material-attribute-type';
export type { MaterialAttributeTypeLayout, ScalarKind } from './material-attribute-type';

export {
  MaterialAttribute,
  MATERIAL_ATTRIBUTE_TYPES,
  isMaterialAttribute,
  materialAttributeFromName,
  materialAttributeName,
} from './material-attribute';
export type { MaterialAttributeName } from './material-attribute';

// Value kinds
export {
  attributeTypeFor,
  isTaggedAttributeValue,
  taggedValue,
  uint, int,
  vector2, vector2ui, vector2i,
  vector3, vector3ui, vector3i,
  vector4, vector4ui, vector4i,
  matrix2x2, matrix2x3, matrix2x4,
  matrix3x2, matrix3x3, matrix3x4,
  matrix4x2, matrix4x3,
} from './attribute-value';
export type {
  AttributeValue,
  AttributeTypeFor,
  AttributeValueFor,
  TaggedAttributeType,
  TaggedAttributeValue,
} from './attribute-value';

// Records and collections
export {
  MaterialAttributeData,
  RECORD_SIZE,
  RECORD_ALIGNMENT,
  PAYLOAD_SIZE,
  MAX_TEXT_NAME_LENGTH,
  IS_LITTLE_ENDIAN,
  isValidMaterialAttributeRecord,
  packMaterialAttribute,
} from './material-attribute-data';
export { MaterialData, MaterialDataBuilder } from './material-data';
export { validateConfig } from './config';
export type { MaterialDataConfig, ResolvedMaterialDataConfig, DuplicateNamePolicy } from './config';
export { MaterialAttributeError } from './errors';
export type { MaterialAttributeErrorCode } from './errors';

// Debugging
export {
  inspectMaterialAttributes,
  formatAttribute,
  formatAttributeValue,
  logMaterialData,
} from './debug/material-inspector';
export type { InspectedAttribute } from './debug/material-inspector';
