export type MaterialAttributeErrorCode =
  | 'UnsupportedValueKind'
  | 'CapacityOverflow'
  | 'InvalidRecordState'
  | 'InvalidValue'
  | 'TypeMismatch'
  | 'DuplicateName';

/**
 * Thrown by record construction, record access and collection construction.
 * `code` tells callers (typically an importer) which attribute failed and why,
 * so they can skip it or abort the whole material.
 */
export class MaterialAttributeError extends Error {
  readonly code: MaterialAttributeErrorCode;

  constructor(code: MaterialAttributeErrorCode, message: string) {
    super(message);
    this.name = 'MaterialAttributeError';
    this.code = code;
  }
}
