import { readJsonFile } from '../utils/jsonFile';
import { assertKnownComparators } from './comparators';
import { FieldSpecError, InputValidationError, UnknownComparatorError } from './errors';
import { FieldRegistrySchema, FieldSpecSchema } from './schemas';
import { isComparatorKind, type FieldSpec } from './types';

/**
 * Rejects registries the engine cannot score: unknown comparator kinds,
 * repeated field names and delimiters that are not valid regular expressions.
 */
export function assertValidFieldSpecs(specs: readonly FieldSpec[]): void {
  assertKnownComparators(specs);

  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new FieldSpecError(spec.name, 'declared more than once');
    }
    seen.add(spec.name);

    if (spec.kind === 'SetOfStrings' && spec.delimiter !== undefined) {
      try {
        new RegExp(spec.delimiter);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new FieldSpecError(spec.name, `invalid delimiter pattern: ${reason}`);
      }
    }
  }
}

export function parseFieldSpecs(raw: unknown, source: string = 'field registry'): FieldSpec[] {
  const registry = FieldRegistrySchema.safeParse(raw);
  if (!registry.success) {
    throw new InputValidationError(source, registry.error);
  }

  const specs = registry.data.fields.map((entry, index) => {
    if (!isComparatorKind(entry.kind)) {
      throw new UnknownComparatorError(entry.name, entry.kind);
    }
    const parsed = FieldSpecSchema.safeParse(entry);
    if (!parsed.success) {
      throw new InputValidationError(`${source} (fields.${index})`, parsed.error);
    }
    return parsed.data;
  });

  assertValidFieldSpecs(specs);
  return specs;
}

export async function loadFieldSpecs(path: string): Promise<FieldSpec[]> {
  return parseFieldSpecs(await readJsonFile(path), path);
}
