import { str as crc32 } from "crc-32";

export const BUCKET_COUNT = 100;

/**
 * Deterministic bucket for an identity within a flag or experiment.
 *
 * CRC-32 (IEEE) of the UTF-8 bytes of `identity:key`, read unsigned, mod 100.
 * Other FlagTier SDKs compute the same value, so a user keeps their bucket
 * across processes, versions and languages.
 */
export function bucket(identity: string, key: string): number {
  // crc-32 returns a signed int32
  const checksum = crc32(`${identity}:${key}`) >>> 0;
  return checksum % BUCKET_COUNT;
}
