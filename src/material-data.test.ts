import { afterEach, describe, it, expect, vi } from 'vitest';
import { uint, vector3, vector4 } from './attribute-value';
import { MaterialAttributeError } from './errors';
import { MaterialAttribute } from './material-attribute';
import { MaterialAttributeData, RECORD_SIZE, packMaterialAttribute } from './material-attribute-data';
import { MaterialAttributeType } from './material-attribute-type';
import { MaterialData, MaterialDataBuilder } from './material-data';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof MaterialAttributeError ? e.code : 'not-a-material-error';
  }
  return undefined;
}

function phong(): MaterialData {
  return new MaterialDataBuilder()
    .add(MaterialAttribute.DiffuseColor, vector4(1, 0, 0, 1))
    .add(MaterialAttribute.AmbientTexture, uint(2))
    .add(MaterialAttribute.Shininess, 80)
    .build();
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('MaterialData', () => {
  it('keeps exactly the records it was built from', () => {
    const material = phong();
    expect(material.attributeCount).toBe(3);
    expect(material.byteLength).toBe(3 * RECORD_SIZE);
    expect(material.names()).toEqual(['DiffuseColor', 'AmbientTexture', 'Shininess']);
  });

  it('looks up records by name', () => {
    const material = phong();
    expect(material.find(MaterialAttribute.DiffuseColor)?.value()).toEqual(vector4(1, 0, 0, 1));
    expect(material.find(MaterialAttribute.AmbientTexture)?.value()).toEqual(uint(2));
    expect(material.find(MaterialAttribute.Shininess)?.value()).toBe(80);
    expect(material.indexOf(MaterialAttribute.Shininess)).toBe(2);
    expect(material.typeOf(MaterialAttribute.AmbientTexture)).toBe(MaterialAttributeType.UnsignedInt);
  });

  it('reports absent names', () => {
    const material = phong();
    expect(material.find(MaterialAttribute.NormalTexture)).toBeUndefined();
    expect(material.find('roughness')).toBeUndefined();
    expect(material.indexOf('roughness')).toBe(-1);
    expect(material.has('roughness')).toBe(false);
    expect(material.typeOf('roughness')).toBeUndefined();
  });

  it('finds well-known records by their text spelling', () => {
    expect(phong().has('DiffuseColor')).toBe(true);
  });

  it('looks up records by position', () => {
    const material = phong();
    expect(material.at(1)?.nameString).toBe('AmbientTexture');
    expect(material.at(-1)).toBeUndefined();
    expect(material.at(3)).toBeUndefined();
    expect(material.at(0.5)).toBeUndefined();
  });

  it('iterates in insertion order with unchanged payloads', () => {
    const records = [
      MaterialAttributeData.create(MaterialAttribute.DoubleSided, true),
      MaterialAttributeData.create('emission', vector3(0.5, 0.25, 0)),
      MaterialAttributeData.create(MaterialAttribute.CoordinateSet, uint(1)),
    ];
    const material = MaterialData.from(records);
    const iterated = [...material];
    expect(iterated).toHaveLength(3);
    iterated.forEach((record, i) => {
      expect(record.type).toBe(records[i].type);
      expect(record.bytes()).toEqual(records[i].bytes());
    });
  });

  it('copies records passed to from()', () => {
    const record = MaterialAttributeData.create(MaterialAttribute.AlphaMask, 0.5);
    const material = MaterialData.from([record]);
    expect(record.value()).toBe(0.5);
    expect(material.find(MaterialAttribute.AlphaMask)?.value()).toBe(0.5);
  });

  it('rejects invalid records in from()', () => {
    const records = [MaterialAttributeData.create('a', true), MaterialAttributeData.invalid()];
    expect(errorCode(() => MaterialData.from(records))).toBe('InvalidRecordState');
  });

  it('returns a copy of its bytes', () => {
    const material = phong();
    const bytes = material.toBytes();
    expect(bytes.length).toBe(3 * RECORD_SIZE);
    expect(bytes[0]).toBe(MaterialAttributeType.Vector4);
    bytes.fill(0);
    expect(material.find(MaterialAttribute.Shininess)?.value()).toBe(80);
  });
});

describe('MaterialData ownership', () => {
  it('takes over the buffer it is given', () => {
    const buffer = new ArrayBuffer(2 * RECORD_SIZE);
    const bytes = new Uint8Array(buffer);
    packMaterialAttribute(bytes, 0, MaterialAttribute.DiffuseTexture, uint(0));
    packMaterialAttribute(bytes, RECORD_SIZE, 'tint', vector3(1, 1, 1));

    const material = new MaterialData(buffer);
    expect(buffer.byteLength).toBe(0);
    expect(material.attributeCount).toBe(2);
    expect(material.find('tint')?.value()).toEqual(vector3(1, 1, 1));
  });

  it('leaves a rejected buffer with the caller', () => {
    const buffer = new ArrayBuffer(2 * RECORD_SIZE);
    packMaterialAttribute(new Uint8Array(buffer), 0, 'only', true);
    expect(errorCode(() => new MaterialData(buffer))).toBe('InvalidRecordState');
    expect(buffer.byteLength).toBe(2 * RECORD_SIZE);
  });

  it('rejects a buffer that is not whole records', () => {
    expect(errorCode(() => new MaterialData(new ArrayBuffer(100)))).toBe('InvalidRecordState');
  });

  it('copies a shared buffer instead of taking it over', () => {
    const shared = new SharedArrayBuffer(RECORD_SIZE);
    const bytes = new Uint8Array(shared);
    packMaterialAttribute(bytes, 0, 'tint', 1.5);

    const material = new MaterialData(shared);
    expect(shared.byteLength).toBe(RECORD_SIZE);
    packMaterialAttribute(bytes, 0, 'tint', true);
    expect(material.find('tint')?.value()).toBe(1.5);
    expect(material.typeOf('tint')).toBe(MaterialAttributeType.Float);
  });

  it('validates a shared buffer', () => {
    expect(errorCode(() => new MaterialData(new SharedArrayBuffer(RECORD_SIZE)))).toBe('InvalidRecordState');
  });

  it('accepts an empty buffer', () => {
    const material = new MaterialData(new ArrayBuffer(0));
    expect(material.attributeCount).toBe(0);
    expect([...material]).toEqual([]);
  });
});

describe('MaterialDataBuilder', () => {
  it('is empty after build()', () => {
    const builder = new MaterialDataBuilder().add('a', true).add('b', false);
    const material = builder.build();
    expect(builder.attributeCount).toBe(0);
    expect(material.attributeCount).toBe(2);
    expect(builder.build().attributeCount).toBe(0);
  });

  it('grows past its initial capacity', () => {
    const builder = new MaterialDataBuilder(1);
    for (let i = 0; i < 5; i++) builder.add(`layer${i}`, uint(i));
    const material = builder.build();
    expect(material.names()).toEqual(['layer0', 'layer1', 'layer2', 'layer3', 'layer4']);
    expect(material.find('layer3')?.value()).toEqual(uint(3));
  });

  it('appends nothing when a record fails', () => {
    const builder = new MaterialDataBuilder().add('kept', 1);
    expect(errorCode(() => builder.add('n'.repeat(62), 1))).toBe('CapacityOverflow');
    expect(builder.attributeCount).toBe(1);
    builder.add('next', 2);
    expect(builder.build().names()).toEqual(['kept', 'next']);
  });

  it('keeps its records when build() rejects them', () => {
    const builder = new MaterialDataBuilder().add('x', 1).add('x', 2);
    expect(errorCode(() => builder.build({ duplicateNames: 'reject' }))).toBe('DuplicateName');
    expect(builder.attributeCount).toBe(2);
  });

  it('rejects a name the encoder would alter', () => {
    const builder = new MaterialDataBuilder();
    expect(errorCode(() => builder.add('gloss\uD800', true))).toBe('InvalidValue');
    expect(builder.attributeCount).toBe(0);
  });

  it('rejects a bad initial capacity', () => {
    expect(() => new MaterialDataBuilder(0)).toThrow('initialCapacity must be a positive integer');
  });
});

describe('duplicate names', () => {
  function withDuplicate(): MaterialDataBuilder {
    return new MaterialDataBuilder()
      .add(MaterialAttribute.DiffuseColor, vector4(1, 1, 1, 1))
      .add(MaterialAttribute.Shininess, 10)
      .add('DiffuseColor', vector4(0, 0, 0, 1));
  }

  it('warns by default and resolves to the first record', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const material = withDuplicate().build();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      'MaterialData: attribute "DiffuseColor" appears at indices 0, 2; lookups use the first',
    );
    expect(material.attributeCount).toBe(3);
    expect(material.find(MaterialAttribute.DiffuseColor)?.value()).toEqual(vector4(1, 1, 1, 1));
    expect(material.duplicateNames()).toEqual(new Map([['DiffuseColor', [0, 2]]]));
  });

  it('rejects under the reject policy', () => {
    expect(errorCode(() => withDuplicate().build({ duplicateNames: 'reject' }))).toBe('DuplicateName');
  });

  it('stays quiet under the allow policy but still reports', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const onDuplicate = vi.fn();
    const material = withDuplicate().build({ duplicateNames: 'allow', onDuplicate });
    expect(warn).not.toHaveBeenCalled();
    expect(onDuplicate).toHaveBeenCalledWith('DiffuseColor', [0, 2]);
    expect(material.attributeCount).toBe(3);
  });

  it('reports nothing for unique names', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(phong().duplicateNames().size).toBe(0);
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('well-known type checking', () => {
  it('is off by default', () => {
    const material = new MaterialDataBuilder().add(MaterialAttribute.DiffuseColor, vector3(1, 0, 0)).build();
    expect(material.typeOf(MaterialAttribute.DiffuseColor)).toBe(MaterialAttributeType.Vector3);
  });

  it('rejects mismatched well-known types when enabled', () => {
    const builder = new MaterialDataBuilder().add(MaterialAttribute.DiffuseColor, vector3(1, 0, 0));
    expect(errorCode(() => builder.build({ checkWellKnownTypes: true }))).toBe('TypeMismatch');
  });

  it('leaves custom names alone', () => {
    const material = new MaterialDataBuilder()
      .add(MaterialAttribute.DiffuseColor, vector4(1, 0, 0, 1))
      .add('DiffuseColour', vector3(1, 0, 0))
      .build({ checkWellKnownTypes: true });
    expect(material.attributeCount).toBe(2);
  });
});
