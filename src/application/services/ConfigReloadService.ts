import type { ConfigSourceName, ReloadOutcomeDTO } from '../dto/ReloadConfigDTO.js';
import type { ConfigSourcePort } from '../ports/ConfigSourcePort.js';
import type { LoggerPort } from '../ports/LoggerPort.js';

export class ConfigReloadService {
  constructor(
    private readonly sources: readonly ConfigSourcePort[],
    private readonly logger: LoggerPort = console,
  ) {}

  // Sources reload independently; one bad file never blocks the others.
  async reload(source?: ConfigSourceName): Promise<ReloadOutcomeDTO[]> {
    const targets = source ? this.sources.filter((candidate) => candidate.source === source) : this.sources;
    const outcomes = await Promise.all(targets.map((target) => target.reload()));

    const reloaded = outcomes.filter((outcome) => outcome.status === 'reloaded').length;
    this.logger.info(`🔄 Configuration reload: ${reloaded}/${outcomes.length} source(s) updated`);

    return outcomes;
  }

  listSources(): ConfigSourceName[] {
    return this.sources.map((source) => source.source);
  }
}
