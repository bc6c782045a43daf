import type { CanonicalKey, HarvestConfig, ReconciledMap } from "./types.js";
import { ASSET_TYPES, SESSIONS } from "./types.js";
import { keyId } from "./reconcile.js";

type KeySpaceConfig = Pick<HarvestConfig, "subjects" | "years">;

export function expectedKeySpace(config: KeySpaceConfig): CanonicalKey[] {
  const keys: CanonicalKey[] = [];
  for (const subject of config.subjects) {
    for (let year = config.years.from; year <= config.years.to; year++) {
      for (const session of SESSIONS) {
        for (const assetType of ASSET_TYPES) {
          keys.push({ subject: subject.code, year, session, assetType });
        }
      }
    }
  }
  return keys;
}

export function missingKeys(map: ReconciledMap, config: KeySpaceConfig): CanonicalKey[] {
  return expectedKeySpace(config).filter((key) => !map.has(keyId(key)));
}
