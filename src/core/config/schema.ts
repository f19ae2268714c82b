import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Deny rules suggested when a project already has its own settings file. */
export const DEFAULT_DENY_RULES = [
  'Read(.env)',
  'Read(.env.*)',
  'Read(**/*.pem)',
  'Read(**/*.key)',
  'Edit(.env)',
  'Write(.env)',
  'Bash(rm -rf /)',
  'Bash(sudo:*)',
];

/** Hook handling. */
export const HooksConfigSchema = z.object({
  /** Hook scripts installed by other components, never by `hooks` */
  exclude: z.array(z.string()).default(['pre-commit-review.sh']),
});

/** Pre-commit review hook. */
export const PrecommitConfigSchema = z.object({
  /** Script under the source hooks directory that becomes the git pre-commit hook */
  script: z.string().min(1).default('pre-commit-review.sh'),
});

/** Security bundle. */
export const SecurityConfigSchema = z.object({
  /** Shell command validation hook */
  hook: z.string().min(1).default('validate-bash.sh'),
  /** Rule documents installed with the bundle */
  rules: z.array(z.string()).default(['security.md', 'security-model.md']),
  /** Deny rules printed for manual merge when the bundled settings file lists none */
  deny: z.array(z.string()).default(DEFAULT_DENY_RULES),
});

/**
 * Distribution configuration, read from adopt.yaml at the distribution root.
 */
export const InstallerConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Configuration directory inside the distribution */
  source_dir: z.string().min(1).default('.claude'),
  /** Configuration directory created in the target project */
  target_dir: z.string().min(1).default('.claude'),
  /** Directory of stack presets inside the distribution */
  stacks_dir: z.string().min(1).default('stacks'),
  /** Settings file name inside the configuration directory */
  settings_file: z.string().min(1).default('settings.json'),
  hooks: withDefaults(HooksConfigSchema),
  precommit: withDefaults(PrecommitConfigSchema),
  security: withDefaults(SecurityConfigSchema),
});

/**
 * The parts of a settings file the installer inspects. Everything else is opaque.
 */
export const SettingsFileSchema = z.object({
  permissions: z
    .object({
      deny: z.array(z.string()).optional(),
    })
    .optional(),
  hooks: z.unknown().optional(),
});

export type HooksConfig = z.infer<typeof HooksConfigSchema>;
export type PrecommitConfig = z.infer<typeof PrecommitConfigSchema>;
export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;
export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;
export type SettingsFile = z.infer<typeof SettingsFileSchema>;
