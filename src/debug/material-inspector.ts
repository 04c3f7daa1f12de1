/**
 * Debug view of flat material attribute buffers (a MaterialData's bytes, or
 * a dump written by other tooling). Walks 64-byte slots and decodes each one
 * without building a MaterialData, so corrupt slots are reported instead of
 * throwing.
 */

import type { AttributeValue } from '../attribute-value';
import { MaterialAttributeData, RECORD_SIZE } from '../material-attribute-data';
import { materialAttributeTypeLayout, materialAttributeTypeName } from '../material-attribute-type';
import type { MaterialData } from '../material-data';

export interface InspectedAttribute {
  readonly index: number;
  readonly valid: boolean;
  readonly typeByte: number;
  /** Type name, or `Invalid(n)`. */
  readonly type: string;
  readonly name?: string;
  readonly wellKnown?: boolean;
  readonly value?: AttributeValue;
}

export function inspectMaterialAttributes(data: Uint8Array): InspectedAttribute[] {
  const attributes: InspectedAttribute[] = [];
  let cursor = 0;

  // A trailing partial slot is ignored.
  while (cursor + RECORD_SIZE <= data.length) {
    const index = cursor / RECORD_SIZE;
    const record = MaterialAttributeData.fromBytes(data, cursor);
    const typeByte = data[cursor];

    if (record.isValid) {
      attributes.push({
        index,
        valid: true,
        typeByte,
        type: materialAttributeTypeName(typeByte),
        name: record.nameString,
        wellKnown: record.isWellKnown,
        value: record.value(),
      });
    } else {
      attributes.push({ index, valid: false, typeByte, type: materialAttributeTypeName(typeByte) });
    }

    cursor += RECORD_SIZE;
  }

  return attributes;
}

function formatNumbers(values: readonly number[]): string {
  return values.map(String).join(', ');
}

export function formatAttributeValue(value: AttributeValue): string {
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  const { columns, rows, components } = materialAttributeTypeLayout(value.type);
  if (columns !== undefined && rows !== undefined) {
    const cols: string[] = [];
    for (let c = 0; c < columns; c++) {
      cols.push(`[${formatNumbers(value.components.slice(c * rows, (c + 1) * rows))}]`);
    }
    return `[${cols.join(', ')}]`;
  }
  if (components === 1) return String(value.components[0]);
  return `(${formatNumbers(value.components)})`;
}

/** One line per attribute, e.g. `#0 DiffuseColor: Vector4 = (1, 0, 0, 1)`. */
export function formatAttribute(attribute: InspectedAttribute): string {
  if (!attribute.valid || attribute.value === undefined) {
    return `#${attribute.index} <invalid record, type byte ${attribute.typeByte}>`;
  }
  const name = attribute.wellKnown ? attribute.name : JSON.stringify(attribute.name);
  return `#${attribute.index} ${name}: ${attribute.type} = ${formatAttributeValue(attribute.value)}`;
}

export function logMaterialData(material: MaterialData, title = 'MaterialData'): void {
  console.group(`${title} (${material.attributeCount} attributes)`);
  for (const attribute of inspectMaterialAttributes(material.toBytes())) {
    console.log(formatAttribute(attribute));
  }
  for (const [name, indices] of material.duplicateNames()) {
    console.warn(`Duplicate attribute ${JSON.stringify(name)} at ${indices.join(', ')}`);
  }
  console.groupEnd();
}
