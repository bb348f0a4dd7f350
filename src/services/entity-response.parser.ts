import { LlmFormatError } from '../middleware/errorHandler';
import { EntityFields, entityFieldsSchema, REQUIRED_FIELDS_BY_TYPE } from '../types/entity';
import { findFirstJsonObject } from '../utils/json-extract';
import logger from '../utils/logger';

/**
 * URL-friendly form of a name: "Tech Innovations Inc." -> "tech-innovations-inc"
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Turn the model's free-form answer into validated entity fields.
 *
 * Fields the entity's type requires but the model left out are set to "Unknown",
 * which is what the prompt asks the model to write for missing information anyway.
 *
 * @throws LlmFormatError when the answer holds no JSON object, the object does not
 *   parse, or it lacks a name or a known entity type
 */
export function parseEntityResponse(responseText: string): EntityFields {
  const json = findFirstJsonObject(responseText);
  if (!json) {
    throw new LlmFormatError('No valid JSON found in AI response');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new LlmFormatError(`Invalid JSON in AI response: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = entityFieldsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new LlmFormatError(`AI response failed validation: ${issues}`);
  }

  const fields: EntityFields = { ...parsed.data };

  const filled = REQUIRED_FIELDS_BY_TYPE[fields.entity_type].filter(field => !fields[field]);
  for (const field of filled) {
    fields[field] = 'Unknown';
  }
  if (filled.length > 0) {
    logger.warn(`AI response for "${fields.name}" missing ${fields.entity_type} fields: ${filled.join(', ')}`);
  }

  if (!fields.slug || fields.slug === 'Unknown') {
    fields.slug = slugify(fields.name);
  }

  return fields;
}
