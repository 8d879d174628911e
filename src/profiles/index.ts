/**
 * Profile Management
 *
 * Profiles are JSON files: the bundled ones live in `profiles/` at the
 * package root, and any other file can be loaded by path.  Every
 * profile is validated against `ProfileSchema` before use.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { basename, join } from 'path';
import { fileURLToPath } from 'url';
import type { Profile } from '../contracts/index.js';
import { ProfileSchema } from '../contracts/index.js';
import { ConfigError, ProvisionError, errorMessage } from '../runner/index.js';

export const BUNDLED_PROFILE_DIR = fileURLToPath(new URL('../../profiles/', import.meta.url));

/**
 * Validate a profile configuration
 */
export function validateProfile(profile: unknown): { valid: boolean; errors: string[] } {
  const result = ProfileSchema.safeParse(profile);

  if (result.success) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
  };
}

/**
 * Parse and validate a profile from an already-decoded JSON value.
 */
export function parseProfile(data: unknown, source = 'profile'): Profile {
  const result = ProfileSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid ${source}: ${details.join('; ')}`, { context: { errors: details } });
  }
  return result.data;
}

/**
 * Load a profile from a JSON file on disk.
 */
export function loadProfileFile(path: string): Profile {
  if (!existsSync(path)) {
    throw new ProvisionError('NOT_FOUND', `Profile file not found: ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Profile ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return parseProfile(data, `profile ${basename(path)}`);
}

/**
 * Get a bundled profile by ID
 */
export function getProfile(profileId: string, dir = BUNDLED_PROFILE_DIR): Profile {
  if (!/^[a-z0-9-]+$/.test(profileId)) {
    throw new ConfigError(`Invalid profile id: ${profileId}`);
  }
  const path = join(dir, `${profileId}.json`);
  if (!existsSync(path)) {
    const known = listProfiles(dir).map((p) => p.profile_id);
    throw new ProvisionError('NOT_FOUND', `Unknown profile "${profileId}" (available: ${known.join(', ')})`);
  }

  const profile = loadProfileFile(path);
  if (profile.profile_id !== profileId) {
    throw new ConfigError(`Profile file ${profileId}.json declares profile_id "${profile.profile_id}"`);
  }
  return profile;
}

/**
 * List all bundled profiles, sorted by ID
 */
export function listProfiles(dir = BUNDLED_PROFILE_DIR): Profile[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => loadProfileFile(join(dir, name)));
}

/**
 * Serialize profile to JSON
 */
export function serializeProfile(profile: Profile): string {
  return JSON.stringify(profile, null, 2);
}
