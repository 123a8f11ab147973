import type { ConfigSourceName, ReloadOutcomeDTO } from '../dto/ReloadConfigDTO.js';

export interface ConfigSourcePort {
  readonly source: ConfigSourceName;
  reload(): Promise<ReloadOutcomeDTO>;
}
