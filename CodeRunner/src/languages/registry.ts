/**
 * Immutable language table, built once at startup.
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError } from '@snippet-sandbox/shared/Types/errors.js';
import { languageTableSchema } from './types.js';
import type { CommandContext, LanguageProfile } from './types.js';

export class LanguageRegistry {
  private readonly byKey: ReadonlyMap<string, LanguageProfile>;
  private readonly profiles: readonly LanguageProfile[];

  private constructor(profiles: LanguageProfile[]) {
    const byKey = new Map<string, LanguageProfile>();
    for (const profile of profiles) {
      for (const key of [profile.id, ...profile.aliases]) {
        const normalized = key.toLowerCase();
        const existing = byKey.get(normalized);
        if (existing) {
          throw new ConfigurationError(
            `Language key "${key}" is claimed by both "${existing.id}" and "${profile.id}"`,
          );
        }
        byKey.set(normalized, profile);
      }
    }
    this.byKey = byKey;
    this.profiles = Object.freeze(profiles);
  }

  /**
   * Validate a raw table (the parsed JSON file) and build a registry from it.
   */
  static fromTable(raw: unknown): LanguageRegistry {
    const parsed = languageTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid language table: ${parsed.error.message}`, {
        issues: parsed.error.issues,
      });
    }

    const profiles = Object.entries(parsed.data).map(([id, entry]): LanguageProfile => {
      let pattern: RegExp | undefined;
      if (entry.entryName.pattern !== undefined) {
        try {
          pattern = new RegExp(entry.entryName.pattern);
        } catch (err) {
          throw new ConfigurationError(`Invalid entryName pattern for "${id}"`, { cause: String(err) });
        }
      }
      return Object.freeze({
        id: id.toLowerCase(),
        fileExtension: entry.fileExtension,
        compileCommand: entry.compileCommand ? Object.freeze([...entry.compileCommand]) : undefined,
        runCommand: Object.freeze([...entry.runCommand]),
        aliases: Object.freeze([...entry.aliases]),
        entryName: Object.freeze({ pattern, fallback: entry.entryName.fallback }),
        memoryLimit: entry.memoryLimit,
      });
    });

    if (profiles.length === 0) {
      throw new ConfigurationError('Language table is empty');
    }
    return new LanguageRegistry(profiles);
  }

  static fromFile(path: string): LanguageRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Cannot read language table at ${path}`, { cause: String(err) });
    }
    return LanguageRegistry.fromTable(raw);
  }

  /** Look up a profile by id or alias, case-insensitively. */
  resolve(language: string): LanguageProfile | undefined {
    return this.byKey.get(language.trim().toLowerCase());
  }

  ids(): string[] {
    return this.profiles.map((p) => p.id);
  }
}

/**
 * Pick the source file stem. Java needs the file named after its public class.
 */
export function resolveEntryName(profile: LanguageProfile, source: string): string {
  const match = profile.entryName.pattern?.exec(source);
  const captured = match?.[1];
  if (captured && /^[A-Za-z_][A-Za-z0-9_]*$/.test(captured)) {
    return captured;
  }
  return profile.entryName.fallback;
}

/**
 * Substitute `{file}`, `{dir}` and `{name}` in each argv element.
 */
export function renderCommand(template: readonly string[], ctx: CommandContext): string[] {
  return template.map((part) =>
    part.replace(/\{(file|dir|name)\}/g, (_, key: keyof CommandContext) => ctx[key]),
  );
}
