/**
 * Zod Schemas for the bundled data files
 *
 * Every JSON file is validated once at load time; the inferred types
 * are the record types the rest of the library works with.
 */

import * as z from 'zod';

// ============ PRIMITIVE SCHEMAS ============

/**
 * Positive integer record ID
 */
export const RecordIdSchema = z.number().int().positive();

/**
 * Non-empty, trimmed-on-read name
 */
export const NameSchema = z.string().trim().min(1, 'Name cannot be empty');

/**
 * Latitude / longitude in decimal degrees
 */
export const LatitudeSchema = z.number().min(-90).max(90);
export const LongitudeSchema = z.number().min(-180).max(180);

/**
 * Census figures shared by divisions, districts and upazilas
 */
const CensusShape = {
  areaKm2: z.number().nonnegative().optional(),
  population: z.number().int().nonnegative().optional(),
  populationYear: z.number().int().min(1800).max(2100).optional(),
  lat: LatitudeSchema.optional(),
  long: LongitudeSchema.optional(),
  headquarter: z.string().optional(),
};

const CountSchema = z.number().int().nonnegative().optional();

/**
 * Civic stats, climate and culture for divisions and districts
 */
const ProfileShape = {
  website: z.string().optional(),
  literacyRate: z.number().min(0).max(100).optional(),
  hospitalsCount: CountSchema,
  schoolsCount: CountSchema,
  policeStations: CountSchema,
  courts: CountSchema,
  voterPopulation: CountSchema,
  pollingCenters: CountSchema,
  avgTempCelsius: z.number().optional(),
  avgRainfallMm: z.number().nonnegative().optional(),
  weatherZone: z.string().optional(),
  touristSpots: z.array(z.string()).optional(),
  festivals: z.array(z.string()).optional(),
  culturalHeritage: z.array(z.string()).optional(),
  notes: z.string().optional(),
};

// ============ ENTITY SCHEMAS ============

export const DivisionRecordSchema = z.object({
  id: RecordIdSchema,
  /** English name (e.g., "Dhaka") */
  name: NameSchema,
  /** Bangla name (e.g., "ঢাকা") */
  nameLocal: NameSchema,
  ...CensusShape,
  ...ProfileShape,
});

export type DivisionRecord = z.infer<typeof DivisionRecordSchema>;

export const DistrictRecordSchema = z.object({
  id: RecordIdSchema,
  divisionId: RecordIdSchema,
  name: NameSchema,
  nameLocal: NameSchema,
  ...CensusShape,
  ...ProfileShape,
  /** "YYYY-MM-DD" */
  established: z.string().optional(),
  /** Official count, may exceed the upazilas bundled with the dataset */
  upazilasCount: CountSchema,
});

export type DistrictRecord = z.infer<typeof DistrictRecordSchema>;

export const UpazilaRecordSchema = z.object({
  id: RecordIdSchema,
  districtId: RecordIdSchema,
  name: NameSchema,
  nameLocal: NameSchema,
  ...CensusShape,
  unionsCount: CountSchema,
});

export type UpazilaRecord = z.infer<typeof UpazilaRecordSchema>;

export const UnionRecordSchema = z.object({
  id: RecordIdSchema,
  upazilaId: RecordIdSchema,
  name: NameSchema,
  nameLocal: NameSchema,
});

export type UnionRecord = z.infer<typeof UnionRecordSchema>;

/**
 * Postcodes carry their ancestors by English name, not by ID
 */
export const PostcodeRecordSchema = z.object({
  postcode: z
    .union([z.string(), z.number().int().nonnegative()])
    .transform((val) => String(val).trim())
    .pipe(z.string().regex(/^\d{4}$/, 'Postcode must be 4 digits')),
  name: NameSchema,
  nameLocal: NameSchema,
  upazila: NameSchema,
  district: NameSchema,
  division: NameSchema,
});

export type PostcodeRecord = z.infer<typeof PostcodeRecordSchema>;

// ============ FILE SCHEMAS ============

export const DivisionsFileSchema = z.object({ divisions: z.array(DivisionRecordSchema) });
export const DistrictsFileSchema = z.object({ districts: z.array(DistrictRecordSchema) });
export const UpazilasFileSchema = z.object({ upazilas: z.array(UpazilaRecordSchema) });
export const UnionsFileSchema = z.object({ unions: z.array(UnionRecordSchema) });
export const PostcodesFileSchema = z.object({ postcodes: z.array(PostcodeRecordSchema) });

// ============ VALIDATION HELPERS ============

/**
 * Safe validate (returns result, doesn't throw)
 */
export function safeValidate<T extends z.ZodType>(
  schema: T,
  data: unknown
): { success: true; data: z.infer<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
