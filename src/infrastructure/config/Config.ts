import path from 'node:path';
import type { ConfigSourceName } from '../../application/dto/ReloadConfigDTO.js';
import type { StoreMode } from '../../application/dto/ProcessMessagesDTO.js';

export interface AppConfig {
  server: {
    port: number;
  };
  rules: {
    directory: string;
    files: Record<ConfigSourceName, string>;
  };
  bankIdentification: {
    fuzzyEnabled: boolean;
    fuzzyThreshold: number;
  };
  storage: {
    defaultMode: StoreMode;
  };
}

const ruleFiles: Record<ConfigSourceName, string> = {
  promoKeywords: 'promo_keywords.json',
  bankPatterns: 'bank_patterns.json',
  extractionTemplates: 'extraction_templates.json',
  accounts: 'accounts.json',
  merchantAliases: 'merchant_aliases.json',
  categoryRules: 'category_rules.json',
  anomalyRules: 'anomaly_rules.json',
};

const readNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected a number, received "${value}"`);
  }

  return parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const directory = path.resolve(env.SMS_CONFIG_DIR ?? path.join(process.cwd(), 'config'));

  return {
    server: {
      port: readNumber(env.PORT, 4000),
    },
    rules: {
      directory,
      files: { ...ruleFiles },
    },
    bankIdentification: {
      fuzzyEnabled: env.SMS_BANK_FUZZY_ENABLED !== 'false',
      fuzzyThreshold: readNumber(env.SMS_BANK_FUZZY_THRESHOLD, 80),
    },
    storage: {
      defaultMode: env.SMS_STORE_MODE === 'upsert' ? 'upsert' : 'skip',
    },
  };
};

export const ruleFilePath = (config: AppConfig, source: ConfigSourceName): string =>
  path.join(config.rules.directory, config.rules.files[source]);
