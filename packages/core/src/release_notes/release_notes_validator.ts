import type { ValidationError } from '../errors';
import type { ChangeItem, ReleaseNoteRecord } from './release_notes.types';
import { CHANGE_CATEGORIES } from './release_notes.types';
import { validateAgainstSchema } from '../schemas/schema_cache';

const REQUIRED_FIELDS = ['version', 'date', 'tag'] as const;
const STRING_FIELDS = ['version', 'date', 'tag', 'summary', 'notes'] as const;
const STRING_LIST_FIELDS = ['highlights', 'components'] as const;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function toChangeItem(value: unknown): ChangeItem | null {
  if (!isPlainObject(value) || typeof value['description'] !== 'string') return null;
  const issue = value['issue'];
  return typeof issue === 'string' && issue ? { description: value['description'], issue } : { description: value['description'] };
}

/**
 * Checks a parsed record against the rules every record must follow.
 * `expectedVersion` is the version the file is named after.
 */
export function validateRecord(data: unknown, expectedVersion: string): ValidationError[] {
  if (!isPlainObject(data)) {
    return [{ field: 'root', message: 'Record must be a JSON object', value: data }];
  }

  const errors: ValidationError[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (!(field in data)) {
      errors.push({ field, message: `Missing required field: ${field}`, value: undefined });
    }
  }

  for (const field of STRING_FIELDS) {
    if (field in data && typeof data[field] !== 'string') {
      errors.push({ field, message: `Field ${field} must be a string`, value: data[field] });
    }
  }

  for (const field of STRING_LIST_FIELDS) {
    if (field in data && !isStringList(data[field])) {
      errors.push({ field, message: `Field ${field} must be a list of strings`, value: data[field] });
    }
  }

  const version = data['version'];
  if ('version' in data && version !== expectedVersion) {
    errors.push({
      field: 'version',
      message: `Version mismatch: file is ${expectedVersion}.json but contains version ${String(version)}`,
      value: version,
    });
  }

  const tag = data['tag'];
  if (typeof tag === 'string' && !tag.startsWith('v')) {
    errors.push({ field: 'tag', message: `Tag should start with 'v': ${tag}`, value: tag });
  }

  const changes = data['changes'];
  if ('changes' in data) {
    if (!isPlainObject(changes)) {
      errors.push({ field: 'changes', message: 'Field changes must be an object', value: changes });
    } else {
      for (const category of CHANGE_CATEGORIES) {
        const items = changes[category];
        if (items === undefined) continue;
        if (!Array.isArray(items) || items.some(item => toChangeItem(item) === null)) {
          errors.push({
            field: `changes.${category}`,
            message: `Field changes.${category} must be a list of { description, issue? } items`,
            value: items,
          });
        }
      }
    }
  }

  return errors;
}

/**
 * Checks a record against a project-supplied JSON schema. Findings are
 * advisory and reported with a `schema:` prefix.
 */
export function validateRecordAgainstSchema(data: unknown, schema: object): ValidationError[] {
  return validateAgainstSchema(schema, data).map(error => ({
    ...error,
    message: `schema: ${error.field}: ${error.message}`,
  }));
}

/**
 * Extracts the well-typed parts of a parsed record. Fields of the wrong
 * type are dropped; validateRecord reports them.
 */
export function toReleaseNoteRecord(data: Record<string, unknown>): ReleaseNoteRecord {
  const record: ReleaseNoteRecord = {};

  for (const field of STRING_FIELDS) {
    const value = data[field];
    if (typeof value === 'string') record[field] = value;
  }
  for (const field of STRING_LIST_FIELDS) {
    const value = data[field];
    if (isStringList(value)) record[field] = value;
  }

  const changes = data['changes'];
  if (isPlainObject(changes)) {
    const typed: NonNullable<ReleaseNoteRecord['changes']> = {};
    for (const category of CHANGE_CATEGORIES) {
      const items = changes[category];
      if (!Array.isArray(items)) continue;
      typed[category] = items
        .map(toChangeItem)
        .filter((item): item is ChangeItem => item !== null);
    }
    record.changes = typed;
  }

  return record;
}
