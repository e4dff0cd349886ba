import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // Convert first 8 characters of hash to numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): string {
  return crypto.randomBytes(8).toString("hex");
}

export function toNumericSeed(seed: string | number): number {
  return typeof seed === "number" ? seed : hashStringToSeed(seed);
}
