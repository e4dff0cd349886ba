/**
 * Seeded sample listing generator for demos and manual pipeline runs
 * Same seed and reference date always give the same rows
 */

import { Faker, es, en } from "@faker-js/faker";
import type { ListingRecord } from "../../types/data-model.js";
import { formatDateValue } from "../../utils/values.js";
import { ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { toNumericSeed } from "../../utils/seed-manager.js";
import type { SampleDataOptions } from "./types.js";

const PROPERTY_TYPES = ["Departamento", "Casa", "Oficina", "Local Comercial", "Terreno"];

const DISTRICTS = [
  "Las Condes",
  "Providencia",
  "Ñuñoa",
  "Vitacura",
  "La Reina",
  "Santiago Centro",
  "Maipú",
  "Puente Alto",
  "San Miguel",
  "La Florida",
];

const STATUSES = [
  { weight: 60, value: "Disponible" },
  { weight: 15, value: "Reservado" },
  { weight: 20, value: "Vendido" },
  { weight: 5, value: "En Remodelación" },
];

const BEDROOMS = [
  { weight: 10, value: 1 },
  { weight: 30, value: 2 },
  { weight: 30, value: 3 },
  { weight: 20, value: 4 },
  { weight: 10, value: 5 },
];

const BATHROOMS = [
  { weight: 20, value: 1 },
  { weight: 40, value: 2 },
  { weight: 30, value: 3 },
  { weight: 10, value: 4 },
];

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SAMPLE_OPTIONS: Omit<SampleDataOptions, "referenceNow"> = {
  count: 150,
  seed: 42,
  nullRate: 0.05,
};

/**
 * Normally distributed draw (Box-Muller) from the seeded generator
 */
function normal(faker: Faker, mean: number, stdDev: number): number {
  const u1 = faker.number.float({ min: Number.EPSILON, max: 1 });
  const u2 = faker.number.float({ min: 0, max: 1 });
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

export function generateSampleListings(
  options: Pick<SampleDataOptions, "referenceNow"> & Partial<SampleDataOptions>,
): ListingRecord[] {
  const { count, seed, nullRate, referenceNow } = { ...DEFAULT_SAMPLE_OPTIONS, ...options };
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`Sample count must be a non-negative integer, got ${count}`);
  }
  if (nullRate < 0 || nullRate > 1) {
    throw new ValidationError(`nullRate must be between 0.0 and 1.0, got ${nullRate}`);
  }

  const faker = new Faker({ locale: [es, en] });
  faker.seed(toNumericSeed(seed));

  // Midnight UTC of the reference day, so dates are whole calendar days
  const today = Math.floor(referenceNow.getTime() / DAY_MS) * DAY_MS;

  const listings: ListingRecord[] = [];
  for (let i = 0; i < count; i++) {
    const daysAgo = faker.number.int({ min: 1, max: 365 });
    listings.push({
      id: `PROP-${String(i + 1).padStart(4, "0")}`,
      property_type: faker.helpers.arrayElement(PROPERTY_TYPES),
      district: faker.helpers.arrayElement(DISTRICTS),
      price: Math.abs(Math.trunc(normal(faker, 250_000, 100_000))),
      area_m2: Math.abs(Math.trunc(normal(faker, 80, 30))),
      bedrooms: faker.helpers.weightedArrayElement(BEDROOMS),
      bathrooms: faker.helpers.weightedArrayElement(BATHROOMS),
      status: faker.helpers.weightedArrayElement(STATUSES),
      publication_date: formatDateValue(new Date(today - daysAgo * DAY_MS)),
      description: `Propiedad ${i + 1} en excelente ubicación`,
    });
  }

  // A fixed share of null descriptions, at seeded positions
  const nullCount = Math.floor(count * nullRate);
  const positions = faker.helpers.arrayElements(
    listings.map((_, index) => index),
    nullCount,
  );
  for (const index of positions) {
    const listing = listings[index];
    if (listing) {
      listing.description = null;
    }
  }

  logger.info("Sample listings generated", { count, seed, nulls: nullCount });
  return listings;
}
