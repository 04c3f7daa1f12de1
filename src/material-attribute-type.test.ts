import { describe, it, expect } from 'vitest';
import {
  MaterialAttributeType,
  isMaterialAttributeType,
  materialAttributeTypeLayout,
  materialAttributeTypeName,
  materialAttributeTypeSize,
} from './material-attribute-type';

describe('MaterialAttributeType', () => {
  it('reserves zero for invalid', () => {
    expect(isMaterialAttributeType(0)).toBe(false);
    expect(MaterialAttributeType.Bool).toBe(1);
  });

  it('has 21 types, none past Matrix4x3', () => {
    for (let i = 1; i <= 21; i++) expect(isMaterialAttributeType(i)).toBe(true);
    expect(isMaterialAttributeType(22)).toBe(false);
    expect(MaterialAttributeType.Matrix4x3).toBe(21);
  });

  it('computes byte sizes', () => {
    expect(materialAttributeTypeSize(MaterialAttributeType.Bool)).toBe(1);
    expect(materialAttributeTypeSize(MaterialAttributeType.Float)).toBe(4);
    expect(materialAttributeTypeSize(MaterialAttributeType.Int)).toBe(4);
    expect(materialAttributeTypeSize(MaterialAttributeType.Vector2i)).toBe(8);
    expect(materialAttributeTypeSize(MaterialAttributeType.Vector3ui)).toBe(12);
    expect(materialAttributeTypeSize(MaterialAttributeType.Vector4)).toBe(16);
    expect(materialAttributeTypeSize(MaterialAttributeType.Matrix2x2)).toBe(16);
    expect(materialAttributeTypeSize(MaterialAttributeType.Matrix2x4)).toBe(32);
    expect(materialAttributeTypeSize(MaterialAttributeType.Matrix3x3)).toBe(36);
    expect(materialAttributeTypeSize(MaterialAttributeType.Matrix3x4)).toBe(48);
    expect(materialAttributeTypeSize(MaterialAttributeType.Matrix4x3)).toBe(48);
  });

  it('never exceeds 48 bytes', () => {
    for (let i = 1; i <= 21; i++) {
      if (!isMaterialAttributeType(i)) throw new Error(`missing type ${i}`);
      expect(materialAttributeTypeSize(i)).toBeLessThanOrEqual(48);
    }
  });

  it('describes matrix layouts as columns x rows', () => {
    expect(materialAttributeTypeLayout(MaterialAttributeType.Matrix2x3)).toEqual({
      scalar: 'f32', components: 6, columns: 2, rows: 3,
    });
    expect(materialAttributeTypeLayout(MaterialAttributeType.Vector3i)).toEqual({ scalar: 'i32', components: 3 });
  });

  it('names types for debug output', () => {
    expect(materialAttributeTypeName(MaterialAttributeType.Vector4)).toBe('Vector4');
    expect(materialAttributeTypeName(0)).toBe('Invalid(0)');
    expect(materialAttributeTypeName(200)).toBe('Invalid(200)');
  });
});
