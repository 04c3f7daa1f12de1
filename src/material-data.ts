import type { AttributeValue } from './attribute-value';
import { validateConfig, type MaterialDataConfig, type ResolvedMaterialDataConfig } from './config';
import { MaterialAttributeError } from './errors';
import {
  MATERIAL_ATTRIBUTE_TYPES,
  attributeNameKey,
  type MaterialAttributeName,
} from './material-attribute';
import {
  MaterialAttributeData,
  RECORD_SIZE,
  isValidMaterialAttributeRecord,
  materialAttributeView,
  packMaterialAttribute,
} from './material-attribute-data';
import { MaterialAttributeType } from './material-attribute-type';

function copyBuffer(source: SharedArrayBuffer): ArrayBuffer {
  const copy = new ArrayBuffer(source.byteLength);
  new Uint8Array(copy).set(new Uint8Array(source));
  return copy;
}

/**
 * The full attribute set of one material: an ordered, read-only run of
 * 64-byte records in a buffer this object owns.
 *
 * The constructor takes over the caller's `ArrayBuffer` (it is detached
 * afterwards), so no one else can mutate the records. A `SharedArrayBuffer`
 * is copied instead. Use
 * {@link MaterialDataBuilder} or {@link MaterialData.from} to produce one.
 */
export class MaterialData implements Iterable<MaterialAttributeData> {
  readonly config: ResolvedMaterialDataConfig;
  private readonly data: Uint8Array;
  private readonly count: number;
  /** Name → index of its first record. */
  private readonly firstIndex = new Map<string, number>();
  private readonly duplicates = new Map<string, number[]>();

  constructor(source: ArrayBuffer | SharedArrayBuffer, config?: MaterialDataConfig) {
    this.config = validateConfig(config);
    // A shared buffer can't be taken over, so it is snapshotted before validation.
    const buffer = source instanceof ArrayBuffer ? source : copyBuffer(source);
    if (buffer.byteLength % RECORD_SIZE !== 0) {
      throw new MaterialAttributeError(
        'InvalidRecordState',
        `Material buffer of ${buffer.byteLength} bytes is not a whole number of ${RECORD_SIZE}-byte records`,
      );
    }

    // Validate against the caller's bytes first so a rejected buffer stays usable.
    const bytes = new Uint8Array(buffer);
    const count = bytes.length / RECORD_SIZE;
    const occurrences = new Map<string, number[]>();
    for (let i = 0; i < count; i++) {
      const offset = i * RECORD_SIZE;
      if (!isValidMaterialAttributeRecord(bytes.subarray(offset, offset + RECORD_SIZE))) {
        throw new MaterialAttributeError('InvalidRecordState', `Material attribute ${i} is not a valid record`);
      }
      const record = materialAttributeView(bytes, offset);
      const name = record.name;
      if (this.config.checkWellKnownTypes && typeof name !== 'string') {
        const expected = MATERIAL_ATTRIBUTE_TYPES[name];
        if (record.type !== expected) {
          throw new MaterialAttributeError(
            'TypeMismatch',
            `Attribute ${record.nameString} must be ${MaterialAttributeType[expected]}, ` +
            `got ${MaterialAttributeType[record.type]}`,
          );
        }
      }
      const key = record.nameString;
      const seen = occurrences.get(key);
      if (seen) seen.push(i);
      else occurrences.set(key, [i]);
    }

    for (const [name, indices] of occurrences) {
      this.firstIndex.set(name, indices[0]);
      if (indices.length > 1) this.duplicates.set(name, indices);
    }
    if (this.duplicates.size > 0 && this.config.duplicateNames === 'reject') {
      const names = [...this.duplicates.keys()].map((n) => JSON.stringify(n)).join(', ');
      throw new MaterialAttributeError('DuplicateName', `Duplicate material attribute names: ${names}`);
    }

    this.data = new Uint8Array(structuredClone(buffer, { transfer: [buffer] }));
    this.count = count;

    for (const [name, indices] of this.duplicates) {
      if (this.config.duplicateNames === 'warn') {
        console.warn(`MaterialData: attribute "${name}" appears at indices ${indices.join(', ')}; lookups use the first`);
      }
      this.config.onDuplicate?.(name, [...indices]);
    }
  }

  /** Copy `records` into a new MaterialData. The records stay usable. */
  static from(records: Iterable<MaterialAttributeData>, config?: MaterialDataConfig): MaterialData {
    const builder = new MaterialDataBuilder();
    for (const record of records) builder.addRecord(record);
    return builder.build(config);
  }

  get attributeCount(): number {
    return this.count;
  }

  get byteLength(): number {
    return this.data.byteLength;
  }

  /** Record at `index` in insertion order, or undefined if out of range. */
  at(index: number): MaterialAttributeData | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) return undefined;
    return materialAttributeView(this.data, index * RECORD_SIZE);
  }

  *[Symbol.iterator](): Iterator<MaterialAttributeData> {
    for (let i = 0; i < this.count; i++) {
      yield materialAttributeView(this.data, i * RECORD_SIZE);
    }
  }

  /** Index of the first record named `name`, or -1. */
  indexOf(name: MaterialAttributeName): number {
    return this.firstIndex.get(attributeNameKey(name)) ?? -1;
  }

  has(name: MaterialAttributeName): boolean {
    return this.indexOf(name) !== -1;
  }

  /** First record named `name`. A text name spelled like a well-known one finds it too. */
  find(name: MaterialAttributeName): MaterialAttributeData | undefined {
    const index = this.indexOf(name);
    return index === -1 ? undefined : this.at(index);
  }

  typeOf(name: MaterialAttributeName): MaterialAttributeType | undefined {
    return this.find(name)?.type;
  }

  /** Canonical names in record order, duplicates included. */
  names(): string[] {
    return Array.from(this, (record) => record.nameString);
  }

  /** Names that occur more than once, with all their indices. */
  duplicateNames(): Map<string, number[]> {
    return new Map([...this.duplicates].map(([name, indices]) => [name, [...indices]]));
  }

  /** Copy of the flat record buffer, `attributeCount * 64` bytes. */
  toBytes(): Uint8Array {
    return this.data.slice();
  }
}

/**
 * Accumulates records directly in a flat buffer, then hands the buffer to a
 * MaterialData. The builder is empty again after `build()`.
 */
export class MaterialDataBuilder {
  private buffer: Uint8Array;
  private count = 0;

  constructor(initialCapacity = 8) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 1) {
      throw new Error('initialCapacity must be a positive integer');
    }
    this.buffer = new Uint8Array(initialCapacity * RECORD_SIZE);
  }

  get attributeCount(): number {
    return this.count;
  }

  private reserve(count: number): void {
    if (count * RECORD_SIZE <= this.buffer.length) return;
    let capacity = this.buffer.length / RECORD_SIZE;
    while (capacity < count) capacity *= 2;
    const grown = new Uint8Array(capacity * RECORD_SIZE);
    grown.set(this.buffer.subarray(0, this.count * RECORD_SIZE));
    this.buffer = grown;
  }

  /** Pack and append one attribute. On error nothing is appended. */
  add(name: MaterialAttributeName, value: AttributeValue): this {
    this.reserve(this.count + 1);
    packMaterialAttribute(this.buffer, this.count * RECORD_SIZE, name, value);
    this.count++;
    return this;
  }

  /** Append a copy of an existing record. Invalid records throw `InvalidRecordState`. */
  addRecord(record: MaterialAttributeData): this {
    const bytes = record.bytes();
    this.reserve(this.count + 1);
    this.buffer.set(bytes, this.count * RECORD_SIZE);
    this.count++;
    return this;
  }

  /** Hand the packed records to a new MaterialData and reset the builder. */
  build(config?: MaterialDataConfig): MaterialData {
    const packed = new ArrayBuffer(this.count * RECORD_SIZE);
    new Uint8Array(packed).set(this.buffer.subarray(0, packed.byteLength));
    const material = new MaterialData(packed, config);
    this.buffer = new Uint8Array(this.buffer.length);
    this.count = 0;
    return material;
  }
}
