/**
 * Open-ended alert attributes reported by upstream producers
 * (speed, document validity, location, ...). Values are limited to
 * scalar kinds so that rule conditions can read them without guessing.
 */
export type MetadataValue = string | number | boolean;

export type AlertMetadata = Readonly<Record<string, MetadataValue>>;

export function hasField(metadata: AlertMetadata, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(metadata, field);
}

/**
 * Truthiness as used by `autoCloseIf`: `true`, a non-empty string,
 * or a non-zero finite number. Absent fields are never truthy.
 */
export function isFieldTruthy(metadata: AlertMetadata, field: string): boolean {
  if (!hasField(metadata, field)) return false;
  const value = metadata[field];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) && value !== 0;
  return typeof value === 'string' && value.length > 0;
}

export function readString(metadata: AlertMetadata, field: string): string | undefined {
  const value = hasField(metadata, field) ? metadata[field] : undefined;
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(metadata: AlertMetadata, field: string): number | undefined {
  const value = hasField(metadata, field) ? metadata[field] : undefined;
  return typeof value === 'number' ? value : undefined;
}

export function readBoolean(metadata: AlertMetadata, field: string): boolean | undefined {
  const value = hasField(metadata, field) ? metadata[field] : undefined;
  return typeof value === 'boolean' ? value : undefined;
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

/** Keeps only scalar entries; nested objects and nulls from loosely typed sources are dropped. */
export function toAlertMetadata(raw: unknown): AlertMetadata {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return {};
  const result: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isMetadataValue(value)) result[key] = value;
  }
  return result;
}

export function mergeMetadata(base: AlertMetadata, patch: AlertMetadata): AlertMetadata {
  return { ...base, ...patch };
}
