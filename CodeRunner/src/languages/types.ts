/**
 * Language profiles: how a snippet in a given language is written to disk,
 * compiled and run.
 *
 * Command templates are argv arrays. The placeholders `{file}` (absolute
 * source path), `{dir}` (execution directory) and `{name}` (source file stem)
 * are substituted per execution; nothing goes through a shell.
 */

import { z } from 'zod';

const commandSchema = z.array(z.string().min(1)).min(1);

export const entryNameSchema = z.object({
  /** Regex whose first capture group names the source file (e.g. Java's public class). */
  pattern: z.string().optional(),
  fallback: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
});

export const languageProfileSchema = z.object({
  fileExtension: z.string().regex(/^\.[A-Za-z0-9]+$/),
  compileCommand: commandSchema.optional(),
  runCommand: commandSchema,
  aliases: z.array(z.string().min(1)).default([]),
  entryName: entryNameSchema.default({ fallback: 'main' }),
  /** Apply the address-space ceiling. JVMs and V8 reserve more than any useful limit. */
  memoryLimit: z.boolean().default(true),
});

export const languageTableSchema = z.record(
  z.string().regex(/^[a-z0-9+#_-]+$/i, 'language ids are alphanumeric'),
  languageProfileSchema,
);

export interface LanguageProfile {
  readonly id: string;
  readonly fileExtension: string;
  readonly compileCommand?: readonly string[];
  readonly runCommand: readonly string[];
  readonly aliases: readonly string[];
  readonly entryName: {
    readonly pattern?: RegExp;
    readonly fallback: string;
  };
  readonly memoryLimit: boolean;
}

export interface CommandContext {
  file: string;
  dir: string;
  name: string;
}
