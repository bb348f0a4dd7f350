import { z } from 'zod';

export const ENTITY_TYPES = ['social_enterprise', 'investor', 'ecosystem_builder'] as const;
export type EntityType = typeof ENTITY_TYPES[number];

/**
 * Text columns of an entity besides `name` and `entity_type`, in table order
 */
export const ENTITY_TEXT_FIELDS = [
  'slug',
  'website',
  'description',
  'hq_location',
  'contact_email',
  'industry_sector',
  'social_status',
  'funding_stage',
  'cheque_size_range',
  'investment_thesis',
  'program_type',
  'next_intake_date',
  'impact',
  'problem_solved',
  'target_beneficiaries',
  'revenue_model',
  'year_founded',
  'awards',
  'grants',
  'institutional_support',
] as const;

export type EntityTextField = typeof ENTITY_TEXT_FIELDS[number];

/**
 * Fields that must carry a value (possibly "Unknown") for each entity type
 */
export const REQUIRED_FIELDS_BY_TYPE: Record<EntityType, EntityTextField[]> = {
  social_enterprise: [
    'industry_sector',
    'social_status',
    'funding_stage',
    'impact',
    'problem_solved',
    'target_beneficiaries',
    'revenue_model',
    'year_founded',
    'awards',
    'grants',
    'institutional_support',
  ],
  investor: ['cheque_size_range', 'investment_thesis'],
  ecosystem_builder: ['program_type', 'next_intake_date'],
};

// Models answer "2015" and 2015 interchangeably; null means "not found"
const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform(value => (value === null || value === undefined ? undefined : String(value).trim()));

const entityTypeSchema = z
  .string()
  .transform(value => value.trim().toLowerCase().replace(/[\s-]+/g, '_'))
  .pipe(z.enum(ENTITY_TYPES));

const entityShape = {
  name: z.string().trim().min(1),
  entity_type: entityTypeSchema,
  slug: optionalText,
  website: optionalText,
  description: optionalText,
  hq_location: optionalText,
  contact_email: optionalText,
  industry_sector: optionalText,
  social_status: optionalText,
  funding_stage: optionalText,
  cheque_size_range: optionalText,
  investment_thesis: optionalText,
  program_type: optionalText,
  next_intake_date: optionalText,
  impact: optionalText,
  problem_solved: optionalText,
  target_beneficiaries: optionalText,
  revenue_model: optionalText,
  year_founded: optionalText,
  awards: optionalText,
  grants: optionalText,
  institutional_support: optionalText,
};

/**
 * Fields as the model returns them. Keys written with hyphens (`industry-sector`)
 * are accepted under their underscore name; unknown keys are dropped.
 */
export const entityFieldsSchema = z.preprocess(
  value =>
    value !== null && typeof value === 'object' && !Array.isArray(value)
      ? Object.fromEntries(Object.entries(value).map(([key, field]) => [key.replace(/-/g, '_'), field]))
      : value,
  z.object(entityShape)
);

export type EntityFields = z.output<typeof entityFieldsSchema>;

const timestamp = z
  .union([z.date(), z.string()])
  .transform(value => (value instanceof Date ? value.toISOString() : value));

/**
 * A row as read back from the store
 */
export const storedEntitySchema = z.object({
  ...entityShape,
  id: z.union([z.string(), z.number()]).transform(String),
  website: z.string(),
  created_at: timestamp,
  updated_at: timestamp,
});

/**
 * A record ready to be written: the model's fields plus the values the pipeline owns
 */
export interface EntityRecordInput extends EntityFields {
  website: string;
  slug: string;
  contact_email: string;
  updated_at: string;
  created_at?: string;
}

export type EntityRecord = z.output<typeof storedEntitySchema>;

export type UpsertOperation = 'created' | 'updated';

export interface ScrapeOutcome {
  operation: UpsertOperation;
  record: EntityRecord;
}
