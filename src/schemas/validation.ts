import { z } from 'zod';
import { isSupportedCountry } from 'libphonenumber-js';
import { DEFAULT_CONFIG } from '../constants/config.js';

export const PhoneRegionSchema = z
  .string()
  .trim()
  .toUpperCase()
  .refine(isSupportedCountry, 'Unsupported phone region (expected an ISO 3166 alpha-2 code)');

export const CheckKindSchema = z.enum([
  'numeric',
  'range',
  'age',
  'decimal',
  'length',
  'alphanumeric',
  'alphabetic',
  'name',
  'address',
  'placename',
  'gender',
  'phone',
  'email',
  'zipcode',
  'pincode',
  'date',
  'boolean',
  'password',
]);

export const FileKindSchema = z.enum(['document', 'image']);

const LengthBoundSchema = z.coerce.number().int().min(0, 'Length bounds must be non-negative');

// Request parameters arrive as strings from the CLI and query strings
export const CheckOptionsSchema = z
  .object({
    min: z.coerce.number().finite().optional(),
    max: z.coerce.number().finite().optional(),
    minLength: LengthBoundSchema.optional(),
    maxLength: LengthBoundSchema.optional(),
    places: z.coerce.number().int().min(1).max(20).optional(),
    minAge: z.coerce.number().min(0).optional(),
    maxAge: z.coerce.number().min(0).optional(),
    region: PhoneRegionSchema.optional(),
    checkDomain: z.boolean().optional(),
  })
  .refine(
    ({ min, max }) => min === undefined || max === undefined || min <= max,
    'min must not exceed max'
  )
  .refine(
    ({ minLength, maxLength }) => !minLength || !maxLength || minLength <= maxLength,
    'minLength must not exceed maxLength'
  );

export const FileCheckOptionsSchema = z.object({
  kind: FileKindSchema.default('document'),
  maxSizeMb: z.coerce.number().positive().max(100).optional(),
  verifyImage: z.boolean().optional(),
});

export const FieldcheckConfigSchema = z.object({
  checkEmailDomain: z.boolean().default(DEFAULT_CONFIG.checkEmailDomain),
  dnsTimeoutMs: z
    .number()
    .int()
    .min(100, 'DNS timeout must be at least 100ms')
    .max(30_000, 'DNS timeout must be 30000ms or less')
    .default(DEFAULT_CONFIG.dnsTimeoutMs),
  documentMaxSizeMb: z.number().positive().max(100).default(DEFAULT_CONFIG.documentMaxSizeMb),
  imageMaxSizeMb: z.number().positive().max(100).default(DEFAULT_CONFIG.imageMaxSizeMb),
  verifyImages: z.boolean().default(DEFAULT_CONFIG.verifyImages),
  phoneRegion: PhoneRegionSchema.optional(),
  validGenders: z
    .array(z.string().trim().min(1))
    .min(1, 'At least one gender value is required')
    .default(DEFAULT_CONFIG.validGenders),
});

export type ConfigKey = keyof typeof FieldcheckConfigSchema.shape;

export type ValidatedConfig = z.infer<typeof FieldcheckConfigSchema>;
export type ValidatedCheckOptions = z.infer<typeof CheckOptionsSchema>;
export type ValidatedFileCheckOptions = z.infer<typeof FileCheckOptionsSchema>;

