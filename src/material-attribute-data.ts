import {
  flattenAttributeValue,
  unflattenAttributeValue,
  type AttributeValue,
  type TaggedAttributeType,
  type TaggedAttributeValue,
} from './attribute-value';
import { MaterialAttributeError } from './errors';
import {
  attributeNameKey,
  isMaterialAttribute,
  materialAttributeName,
  resolveAttributeName,
  type MaterialAttribute,
  type MaterialAttributeName,
} from './material-attribute';
import {
  MaterialAttributeType,
  isMaterialAttributeType,
  materialAttributeTypeLayout,
  materialAttributeTypeSize,
  type ScalarKind,
} from './material-attribute-type';

/*
 * Record layout (64 bytes, records are stored back to back):
 *
 *   [0]        type tag, 0 = invalid
 *   [1]        name header: 0x80 = well-known name, otherwise text length
 *   [2..]      well-known: one MaterialAttribute byte / text: UTF-8 bytes
 *   [1+name..] value bytes, materialAttributeTypeSize(type) long
 *   rest       zero
 */
export const RECORD_SIZE = 64;
export const RECORD_ALIGNMENT = 8;
/** Bytes available for name encoding plus value. */
export const PAYLOAD_SIZE = RECORD_SIZE - 1;

const TYPE_OFFSET = 0;
const NAME_HEADER_OFFSET = 1;
const NAME_DATA_OFFSET = 2;
const WELL_KNOWN_NAME = 0x80;
const WELL_KNOWN_NAME_SIZE = 2;
/** A text name can't be longer than this even with a 1-byte Bool value. */
export const MAX_TEXT_NAME_LENGTH = PAYLOAD_SIZE - 1 - 1;

/** True on little-endian platforms. Values are stored in native order. */
export const IS_LITTLE_ENDIAN =
  new Uint8Array(new Uint32Array([1]).buffer)[0] === 1;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

type EncodedName =
  | { readonly kind: 'well-known'; readonly attribute: MaterialAttribute; readonly size: number }
  | { readonly kind: 'text'; readonly bytes: Uint8Array; readonly size: number };

function encodeName(name: MaterialAttributeName): EncodedName {
  const resolved = resolveAttributeName(name);
  if (typeof resolved !== 'string') {
    if (!isMaterialAttribute(resolved)) {
      throw new MaterialAttributeError('InvalidValue', `Unknown well-known material attribute ${String(resolved)}`);
    }
    return { kind: 'well-known', attribute: resolved, size: WELL_KNOWN_NAME_SIZE };
  }
  const bytes = textEncoder.encode(resolved);
  // Lone surrogates are replaced with U+FFFD by the encoder.
  if (textDecoder.decode(bytes) !== resolved) {
    throw new MaterialAttributeError('InvalidValue', `Attribute name ${JSON.stringify(resolved)} is not well-formed UTF-16`);
  }
  return { kind: 'text', bytes, size: 1 + bytes.length };
}

function writeScalar(view: DataView, offset: number, scalar: ScalarKind, value: number): void {
  switch (scalar) {
    case 'bool': view.setUint8(offset, value); break;
    case 'f32': view.setFloat32(offset, value, IS_LITTLE_ENDIAN); break;
    case 'u32': view.setUint32(offset, value, IS_LITTLE_ENDIAN); break;
    case 'i32': view.setInt32(offset, value, IS_LITTLE_ENDIAN); break;
  }
}

function readScalar(view: DataView, offset: number, scalar: ScalarKind): number {
  switch (scalar) {
    case 'bool': return view.getUint8(offset);
    case 'f32': return view.getFloat32(offset, IS_LITTLE_ENDIAN);
    case 'u32': return view.getUint32(offset, IS_LITTLE_ENDIAN);
    case 'i32': return view.getInt32(offset, IS_LITTLE_ENDIAN);
  }
}

/**
 * Pack one attribute into `RECORD_SIZE` bytes of `target` starting at
 * `offset`. Everything is validated before the first byte is touched and
 * the type byte is written last, so a failed call leaves the slot as it was.
 */
export function packMaterialAttribute(
  target: Uint8Array,
  offset: number,
  name: MaterialAttributeName,
  value: AttributeValue,
): void {
  if (offset < 0 || offset + RECORD_SIZE > target.length) {
    throw new RangeError(`Record slot at ${offset} is outside a ${target.length}-byte buffer`);
  }
  const flat = flattenAttributeValue(value);
  const valueSize = materialAttributeTypeSize(flat.type);
  const encoded = encodeName(name);
  if (encoded.size + valueSize > PAYLOAD_SIZE) {
    throw new MaterialAttributeError(
      'CapacityOverflow',
      `Attribute ${JSON.stringify(attributeNameKey(name))} needs ${encoded.size} name bytes and ` +
      `${valueSize} ${MaterialAttributeType[flat.type]} bytes, over the ${PAYLOAD_SIZE}-byte payload`,
    );
  }

  const record = target.subarray(offset, offset + RECORD_SIZE);
  const view = new DataView(record.buffer, record.byteOffset, RECORD_SIZE);
  record.fill(0);

  if (encoded.kind === 'well-known') {
    record[NAME_HEADER_OFFSET] = WELL_KNOWN_NAME;
    record[NAME_DATA_OFFSET] = encoded.attribute;
  } else {
    record[NAME_HEADER_OFFSET] = encoded.bytes.length;
    record.set(encoded.bytes, NAME_DATA_OFFSET);
  }

  const { scalar } = materialAttributeTypeLayout(flat.type);
  const scalarSize = valueSize / flat.components.length;
  let cursor = NAME_HEADER_OFFSET + encoded.size;
  for (const component of flat.components) {
    writeScalar(view, cursor, scalar, component);
    cursor += scalarSize;
  }

  record[TYPE_OFFSET] = flat.type;
}

/** Byte size of the name encoding, or -1 if the header is corrupt. */
function nameSizeOf(record: Uint8Array): number {
  const header = record[NAME_HEADER_OFFSET];
  if (header === WELL_KNOWN_NAME) {
    return isMaterialAttribute(record[NAME_DATA_OFFSET]) ? WELL_KNOWN_NAME_SIZE : -1;
  }
  if (header & WELL_KNOWN_NAME) return -1;
  return 1 + header;
}

/** Structural check of a 64-byte slot: known type, sane name header, fits the payload. */
export function isValidMaterialAttributeRecord(record: Uint8Array): boolean {
  if (record.length < RECORD_SIZE) return false;
  const type = record[TYPE_OFFSET];
  if (!isMaterialAttributeType(type)) return false;
  const nameSize = nameSizeOf(record);
  if (nameSize < 0) return false;
  return nameSize + materialAttributeTypeSize(type) <= PAYLOAD_SIZE;
}

let createView: (bytes: Uint8Array, offset: number) => MaterialAttributeData;

/**
 * View over a slot of a buffer the caller never writes to again, without
 * copying. Only MaterialData uses this; it is not part of the package entry.
 */
export function materialAttributeView(bytes: Uint8Array, offset: number): MaterialAttributeData {
  return createView(bytes, offset);
}

/**
 * One fixed-size material attribute: a type tag, a well-known or text name
 * and the value bytes, all inside a single 64-byte slot.
 *
 * Records are immutable. Instances handed out by a `MaterialData` are views
 * into its buffer; standalone ones own their 64 bytes.
 */
export class MaterialAttributeData {
  private readonly record: Uint8Array;
  private readonly view: DataView;

  private constructor(record: Uint8Array) {
    this.record = record;
    this.view = new DataView(record.buffer, record.byteOffset, RECORD_SIZE);
  }

  /**
   * Build a record from a name and a value. The type tag comes from the value
   * kind: `true` is Bool, `1.5` is Float, `vector4(1, 0, 0, 1)` is Vector4.
   *
   * @throws MaterialAttributeError `CapacityOverflow` if the name and value
   * don't fit in 63 bytes, `UnsupportedValueKind` / `InvalidValue` for bad values.
   */
  static create(name: MaterialAttributeName, value: AttributeValue): MaterialAttributeData {
    const record = new Uint8Array(RECORD_SIZE);
    packMaterialAttribute(record, 0, name, value);
    return new MaterialAttributeData(record);
  }

  /** All-zero record. Every accessor except `isValid` throws on it. */
  static invalid(): MaterialAttributeData {
    return new MaterialAttributeData(new Uint8Array(RECORD_SIZE));
  }

  /** Copy 64 bytes starting at `offset`. The result isn't validated until accessed. */
  static fromBytes(bytes: Uint8Array, offset = 0): MaterialAttributeData {
    if (offset < 0 || offset + RECORD_SIZE > bytes.length) {
      throw new RangeError(`Need ${RECORD_SIZE} bytes at offset ${offset}, buffer has ${bytes.length}`);
    }
    return new MaterialAttributeData(bytes.slice(offset, offset + RECORD_SIZE));
  }

  static {
    createView = (bytes, offset) => new MaterialAttributeData(bytes.subarray(offset, offset + RECORD_SIZE));
  }

  get isValid(): boolean {
    return isValidMaterialAttributeRecord(this.record);
  }

  private check(): void {
    if (!this.isValid) {
      throw new MaterialAttributeError(
        'InvalidRecordState',
        `Material attribute record is invalid (type byte ${this.record[TYPE_OFFSET]})`,
      );
    }
  }

  get type(): MaterialAttributeType {
    this.check();
    const type = this.record[TYPE_OFFSET];
    if (!isMaterialAttributeType(type)) {
      throw new MaterialAttributeError('InvalidRecordState', `Invalid material attribute type ${type}`);
    }
    return type;
  }

  get isWellKnown(): boolean {
    this.check();
    return this.record[NAME_HEADER_OFFSET] === WELL_KNOWN_NAME;
  }

  /** The well-known enum value, or the text name. */
  get name(): MaterialAttributeName {
    this.check();
    if (this.record[NAME_HEADER_OFFSET] === WELL_KNOWN_NAME) {
      const attribute = this.record[NAME_DATA_OFFSET];
      if (!isMaterialAttribute(attribute)) {
        throw new MaterialAttributeError('InvalidRecordState', `Invalid well-known attribute ${attribute}`);
      }
      return attribute;
    }
    const length = this.record[NAME_HEADER_OFFSET];
    return textDecoder.decode(this.record.subarray(NAME_DATA_OFFSET, NAME_DATA_OFFSET + length));
  }

  /** Name as a string; well-known names give their canonical spelling. */
  get nameString(): string {
    const name = this.name;
    return typeof name === 'string' ? name : materialAttributeName(name);
  }

  private get valueOffset(): number {
    return NAME_HEADER_OFFSET + nameSizeOf(this.record);
  }

  /** Size of the value in bytes, as implied by the type tag. */
  get valueSize(): number {
    return materialAttributeTypeSize(this.type);
  }

  /** Decode the value. Equal to what the record was created with, after f32 rounding. */
  value(): AttributeValue {
    const type = this.type;
    const { scalar, components } = materialAttributeTypeLayout(type);
    const scalarSize = materialAttributeTypeSize(type) / components;
    const values: number[] = [];
    for (let i = 0, cursor = this.valueOffset; i < components; i++, cursor += scalarSize) {
      values.push(readScalar(this.view, cursor, scalar));
    }
    return unflattenAttributeValue(type, values);
  }

  /** Decode the value, asserting its type first. */
  valueAs(type: MaterialAttributeType.Bool): boolean;
  valueAs(type: MaterialAttributeType.Float): number;
  valueAs<T extends TaggedAttributeType>(type: T): TaggedAttributeValue<T>;
  valueAs(type: MaterialAttributeType): AttributeValue {
    const actual = this.type;
    if (actual !== type) {
      throw new MaterialAttributeError(
        'TypeMismatch',
        `Attribute ${JSON.stringify(this.nameString)} is ${MaterialAttributeType[actual]}, not ${MaterialAttributeType[type]}`,
      );
    }
    return this.value();
  }

  /** Copy of the raw value bytes, in native byte order. */
  valueBytes(): Uint8Array {
    const size = this.valueSize;
    const offset = this.valueOffset;
    return this.record.slice(offset, offset + size);
  }

  /** Copy of the whole 64-byte record. */
  bytes(): Uint8Array {
    this.check();
    return this.record.slice();
  }
}
