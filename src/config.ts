// src/config.ts - Converter configuration (defaults, validation, loading)

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError, isNodeError, getErrorMessage, IOError, FileNotFoundError } from './errorHelpers.js';

/** 0.4 inch, the smallest direct indent read back as a quote or nested bullet */
export const DEFAULT_QUOTE_INDENT_TWIPS = 576;

export const ConverterConfigSchema = z
  .object({
    /** Leading spaces that turn a `- ` line into the nested bullet level */
    nestedBulletIndent: z.number().int().min(1).default(2),
    /** Direct left indent (twips) read back as `> ` or a nested bullet */
    quoteIndentTwips: z.number().int().min(0).default(DEFAULT_QUOTE_INDENT_TWIPS),
    /** How a horizontal rule is written into the document */
    ruleStyle: z.enum(['border', 'glyph']).default('border'),
    ruleGlyph: z.string().min(1).default('─'),
    ruleGlyphLength: z.number().int().min(1).default(50),
    /** A glyph-only paragraph must be longer than this to read back as `---` */
    ruleMinLength: z.number().int().min(0).default(10),
    font: z.string().min(1).default('Calibri'),
    /** Body font size in points */
    fontSize: z.number().positive().default(11),
  })
  .strict()
  // A written glyph line must read back as a rule
  .superRefine((config, ctx) => {
    if (config.ruleGlyphLength <= config.ruleMinLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ruleGlyphLength'],
        message: `must be greater than ruleMinLength (${config.ruleMinLength})`,
      });
    }
  });

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;

export const DEFAULT_CONFIG: ConverterConfig = ConverterConfigSchema.parse({});

/**
 * Validate a partial configuration and fill in defaults.
 * @throws ConfigError listing every offending key
 */
export function resolveConfig(input: unknown = {}): ConverterConfig {
  const result = ConverterConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

/** Load and validate a JSON configuration file */
export async function loadConfigFile(configPath: string): Promise<ConverterConfig> {
  let content: string;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- configPath is supplied by the invoking user
    content = await fs.readFile(configPath, 'utf8');
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new FileNotFoundError(configPath);
    }
    throw new IOError(`Cannot read config file ${configPath}: ${getErrorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${getErrorMessage(err)}`);
  }
  return resolveConfig(parsed);
}
