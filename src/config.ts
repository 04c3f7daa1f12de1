/** What a MaterialData does when two records resolve to the same name. */
export type DuplicateNamePolicy = 'allow' | 'warn' | 'reject';

/** Options for constructing a MaterialData. */
export interface MaterialDataConfig {
  /** Default 'warn': keep every record, log once per duplicated name. */
  duplicateNames?: DuplicateNamePolicy;
  /** Reject well-known attributes stored with a type other than the documented one. Default false. */
  checkWellKnownTypes?: boolean;
  /** Called for each duplicated name under 'allow' and 'warn', with every index it occurs at. */
  onDuplicate?: (name: string, indices: number[]) => void;
}

/** Config with all defaults applied. */
export interface ResolvedMaterialDataConfig {
  duplicateNames: DuplicateNamePolicy;
  checkWellKnownTypes: boolean;
  onDuplicate?: (name: string, indices: number[]) => void;
}

const DUPLICATE_NAME_POLICIES: readonly DuplicateNamePolicy[] = ['allow', 'warn', 'reject'];

export function validateConfig(config: MaterialDataConfig = {}): ResolvedMaterialDataConfig {
  const duplicateNames = config.duplicateNames ?? 'warn';
  if (!DUPLICATE_NAME_POLICIES.includes(duplicateNames)) {
    throw new Error(`duplicateNames must be one of ${DUPLICATE_NAME_POLICIES.join(', ')}`);
  }
  if (config.onDuplicate !== undefined && typeof config.onDuplicate !== 'function') {
    throw new Error('onDuplicate must be a function');
  }
  return {
    duplicateNames,
    checkWellKnownTypes: config.checkWellKnownTypes ?? false,
    onDuplicate: config.onDuplicate,
  };
}
