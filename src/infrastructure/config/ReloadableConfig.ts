import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ConfigSourceName, ReloadOutcomeDTO } from '../../application/dto/ReloadConfigDTO.js';
import type { ConfigSourcePort } from '../../application/ports/ConfigSourcePort.js';
import type { LoggerPort } from '../../application/ports/LoggerPort.js';
import { ConfigurationError } from '../../domain/errors/ConfigurationError.js';

export interface ConfigDefinition<TSnapshot> {
  source: ConfigSourceName;
  // Turns raw JSON into a compiled snapshot; throws ConfigurationError when invalid.
  compile(raw: unknown): TSnapshot;
  defaults(): TSnapshot;
}

export const defineConfig = <TDto, TSnapshot>(params: {
  source: ConfigSourceName;
  schema: z.ZodType<TDto, z.ZodTypeDef, unknown>;
  build: (dto: TDto) => TSnapshot;
  defaults: unknown;
}): ConfigDefinition<TSnapshot> => {
  const compile = (raw: unknown): TSnapshot => {
    const parsed = params.schema.safeParse(raw);

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(params.source, `Invalid configuration (${issues.length} issue(s))`, issues);
    }

    return params.build(parsed.data);
  };

  return {
    source: params.source,
    compile,
    defaults: () => compile(params.defaults),
  };
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const describeError = (error: unknown): string => {
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    return `${error.message}: ${error.issues.join('; ')}`;
  }

  return error instanceof Error ? error.message : String(error);
};

const parseJson = (source: ConfigSourceName, contents: string): unknown => {
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(source, `Malformed JSON: ${describeError(error)}`);
  }
};

/**
 * Holds the current immutable snapshot of one configuration source.
 *
 * Readers take `current` once per operation and keep using that object, so a
 * reload that lands mid-operation never mixes old and new rules. A reload
 * compiles the complete new snapshot first and only then swaps the reference.
 */
export class ReloadableConfig<TSnapshot> implements ConfigSourcePort {
  private snapshot: TSnapshot;

  private constructor(
    private readonly definition: ConfigDefinition<TSnapshot>,
    private readonly filePath: string | null,
    initial: TSnapshot,
    private readonly logger: LoggerPort,
  ) {
    this.snapshot = initial;
  }

  /** Startup load: a missing file falls back to defaults, a malformed one throws. */
  static fromFile<TSnapshot>(
    definition: ConfigDefinition<TSnapshot>,
    filePath: string,
    logger: LoggerPort = console,
  ): ReloadableConfig<TSnapshot> {
    let contents: string;

    try {
      contents = readFileSync(filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new ConfigurationError(definition.source, `Unable to read ${filePath}: ${describeError(error)}`);
      }

      logger.warn(`⚠️ ${definition.source}: ${filePath} not found, using built-in defaults`);
      return new ReloadableConfig(definition, filePath, definition.defaults(), logger);
    }

    const snapshot = definition.compile(parseJson(definition.source, contents));
    logger.info(`📄 ${definition.source}: loaded ${filePath}`);

    return new ReloadableConfig(definition, filePath, snapshot, logger);
  }

  static fromValue<TSnapshot>(
    definition: ConfigDefinition<TSnapshot>,
    raw: unknown,
    logger: LoggerPort = console,
  ): ReloadableConfig<TSnapshot> {
    return new ReloadableConfig(definition, null, definition.compile(raw), logger);
  }

  get source(): ConfigSourceName {
    return this.definition.source;
  }

  get current(): TSnapshot {
    return this.snapshot;
  }

  /** Never throws: a missing or malformed file leaves the previous snapshot in place. */
  async reload(): Promise<ReloadOutcomeDTO> {
    const source = this.definition.source;

    if (this.filePath === null) {
      return { source, status: 'static', message: 'Configuration was provided in memory' };
    }

    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        const message = `${this.filePath} not found, keeping previous configuration`;
        this.logger.warn(`⚠️ ${source}: ${message}`);
        return { source, status: 'missing', message };
      }

      const message = `Unable to read ${this.filePath}: ${describeError(error)}`;
      this.logger.error(`❌ ${source}: ${message}`);
      return { source, status: 'rejected', message };
    }

    try {
      const next = this.definition.compile(parseJson(source, contents));
      this.snapshot = next;
    } catch (error) {
      const message = `${describeError(error)}; keeping previous configuration`;
      this.logger.error(`❌ ${source}: ${message}`);
      return { source, status: 'rejected', message };
    }

    this.logger.info(`🔄 ${source}: reloaded ${this.filePath}`);
    return { source, status: 'reloaded', message: `Reloaded ${this.filePath}` };
  }
}
