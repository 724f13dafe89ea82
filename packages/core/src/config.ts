/**
 * Pipeline configuration.
 *
 * The configuration is read once, validated, frozen and then handed to
 * every component at construction. Nothing reads it from process-wide
 * state afterwards.
 */

import { z, type ZodIssue } from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError, errorMessage, type ConfigIssue } from './errors.js';
import { getDefaultCacheDir } from './paths.js';
import { PHASES, type Phase } from './types.js';

/** Default name of the configuration file. */
export const DEFAULT_CONFIG_FILE = 'matrix-ci.json';

const commandTemplate = z.string().trim().min(1, 'Command must not be empty');

const phaseCommandsSchema = z.object({
    install: commandTemplate,
    lint: commandTemplate,
    test: commandTemplate,
});

export const PipelineConfigSchema = z.object({
    /** Ordered runtime version identifiers */
    environments: z.array(z.string().trim().min(1, 'Environment identifier must not be empty'))
        .superRefine((identifiers, ctx) => {
            const seen = new Set<string>();
            identifiers.forEach((identifier, index) => {
                if (seen.has(identifier)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `Duplicate environment "${identifier}"`,
                        path: [index],
                    });
                }
                seen.add(identifier);
            });
        }),

    /** Dependency manifest whose checksum participates in the cache key */
    manifest: z.string().min(1),

    /** Base directory for resolving relative paths */
    basePath: z.string().min(1),

    provision: z.object({
        /** Runtime install command; `{env}` is replaced by the identifier */
        command: commandTemplate,
        /** Directory holding the provisioned runtimes */
        root: z.string().min(1).default('.runtimes'),
    }),

    phases: phaseCommandsSchema,

    concurrency: z.number().int().positive().default(5),

    /** Fatal phases; a failure at or before the last of them fails the pipeline */
    failOn: z.array(z.enum(PHASES)).default([...PHASES]),

    /** Per-command timeout in milliseconds */
    timeoutMs: z.number().int().positive().optional(),

    artifacts: z.object({
        /** Test-phase output directory; `{env}` is replaced by the identifier */
        source: z.string().min(1).default('test-reports/{env}'),
        patterns: z.array(z.string().min(1)).min(1).default(['**/*']),
        /** Collection directory, one subdirectory per environment */
        directory: z.string().min(1).default('.matrix-ci/artifacts'),
    }).default({}),

    cache: z.object({
        enabled: z.boolean().default(true),
        dir: z.string().min(1).default(getDefaultCacheDir),
        /** Bumped to invalidate every existing entry */
        version: z.string().regex(/^[A-Za-z0-9._]+$/, 'Use letters, digits, "." or "_"').default('v1'),
        prefix: z.string().regex(/^[A-Za-z0-9._]+$/, 'Use letters, digits, "." or "_"').default('dependencies'),
        /** Allow warm starts from entries of the same matrix or version */
        fallback: z.boolean().default(true),
    }).default({}),

    report: z.object({
        /** Durable artifact destination; publishing is skipped when unset */
        storeDir: z.string().min(1).optional(),
        destination: z.string().min(1).default('test-reports'),
        /** Coverage service endpoint; upload is skipped when unset */
        url: z.string().url().optional(),
        /** Environment variable holding the bearer token */
        tokenEnv: z.string().min(1).default('COVERAGE_TOKEN'),
        coverageFile: z.string().min(1).default('coverage.xml'),
    }).default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Values given on the command line or as Action inputs.
 * They take precedence over the configuration file.
 */
export interface ConfigOverrides {
    basePath?: string;
    concurrency?: number;
    failOn?: Phase[];
    cacheEnabled?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigIssue[] {
    return zodIssues.map(issue => ({
        path: issue.path.filter(
            (p): p is string | number => typeof p === 'string' || typeof p === 'number'
        ),
        message: issue.message,
        code: issue.code,
    }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
    const values: unknown[] = Object.values(obj);
    for (const value of values) {
        if (value && typeof value === 'object' && !Object.isFrozen(value)) {
            deepFreeze(value);
        }
    }
    return Object.freeze(obj);
}

/**
 * Validate raw configuration, apply overrides and freeze the result.
 *
 * @param input - Parsed configuration file content
 * @param defaultBasePath - Used when neither the input nor the overrides set basePath
 * @throws ConfigError listing every validation issue
 */
export function loadPipelineConfig(
    input: unknown,
    overrides: ConfigOverrides = {},
    defaultBasePath: string = process.cwd()
): Readonly<PipelineConfig> {
    if (!isRecord(input)) {
        throw new ConfigError('Invalid configuration: expected a JSON object');
    }

    const raw: Record<string, unknown> = { basePath: defaultBasePath, ...input };
    if (overrides.basePath !== undefined) raw.basePath = overrides.basePath;
    if (overrides.concurrency !== undefined) raw.concurrency = overrides.concurrency;
    if (overrides.failOn !== undefined) raw.failOn = overrides.failOn;
    if (overrides.cacheEnabled !== undefined) {
        raw.cache = { ...(isRecord(raw.cache) ? raw.cache : {}), enabled: overrides.cacheEnabled };
    }

    const result = PipelineConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = formatZodIssues(result.error.issues);
        throw new ConfigError(`Invalid configuration: ${issues.length} validation error(s)`, issues);
    }

    const config = result.data;
    config.basePath = path.resolve(config.basePath);
    return deepFreeze(config);
}

/**
 * Read a JSON configuration file.
 * Relative paths inside it resolve against the file's directory unless basePath says otherwise.
 */
export async function readPipelineConfig(
    filePath: string,
    overrides: ConfigOverrides = {}
): Promise<Readonly<PipelineConfig>> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read configuration ${filePath}: ${errorMessage(error)}`, [], { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new ConfigError(`Configuration ${filePath} is not valid JSON: ${errorMessage(error)}`, [], { cause: error });
    }

    return loadPipelineConfig(parsed, overrides, path.dirname(path.resolve(filePath)));
}

/**
 * Parse a comma-separated phase list such as "install,test".
 */
export function parsePhaseList(value: string): Phase[] {
    const phases = value.split(',').map(s => s.trim()).filter(Boolean);
    const invalid = phases.filter(phase => !isPhase(phase));
    if (invalid.length > 0) {
        throw new ConfigError(`Unknown phase(s): ${invalid.join(', ')}. Expected ${PHASES.join(', ')}`);
    }
    return phases.filter(isPhase);
}

function isPhase(value: string): value is Phase {
    return PHASES.some(phase => phase === value);
}

/**
 * Resolve a configured path against the base path.
 */
export function resolveConfigPath(config: PipelineConfig, target: string): string {
    return path.resolve(config.basePath, target);
}

/**
 * Substitute `{env}` in a command or path template.
 */
export function expandTemplate(template: string, identifier: string): string {
    return template.split('{env}').join(identifier);
}
