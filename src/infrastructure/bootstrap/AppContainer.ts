import type { HistoryProviderPort } from '../../application/ports/HistoryProviderPort.js';
import type { LoggerPort } from '../../application/ports/LoggerPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { ConfigReloadService } from '../../application/services/ConfigReloadService.js';
import { MessageProcessingService } from '../../application/services/MessageProcessingService.js';
import { accountsConfig, CardAccountResolver, type AccountsSnapshot } from '../adapters/accounts/CardAccountResolver.js';
import { HistoryAnomalyDetector, anomalyRulesConfig, type AnomalySnapshot } from '../adapters/anomaly/HistoryAnomalyDetector.js';
import { bankPatternsConfig, PatternBankIdentifier, type BankPatternsSnapshot } from '../adapters/bank/PatternBankIdentifier.js';
import {
  categoryRulesConfig,
  RuleBasedCategorizer,
  type CategoryRulesSnapshot,
} from '../adapters/categorizer/RuleBasedCategorizer.js';
import {
  extractionTemplatesConfig,
  TemplateFieldExtractor,
  type ExtractionTemplatesSnapshot,
} from '../adapters/extraction/TemplateFieldExtractor.js';
import { StorageHistoryProvider } from '../adapters/history/StorageHistoryProvider.js';
import {
  AliasMerchantResolver,
  merchantAliasesConfig,
  type MerchantAliasesSnapshot,
} from '../adapters/merchant/AliasMerchantResolver.js';
import { KeywordPromoFilter, promoKeywordsConfig, type PromoSnapshot } from '../adapters/promo/KeywordPromoFilter.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { loadConfig, ruleFilePath, type AppConfig } from '../config/Config.js';
import { ReloadableConfig, type ConfigDefinition } from '../config/ReloadableConfig.js';

export interface RuleSources {
  promoKeywords: ReloadableConfig<PromoSnapshot>;
  bankPatterns: ReloadableConfig<BankPatternsSnapshot>;
  extractionTemplates: ReloadableConfig<ExtractionTemplatesSnapshot>;
  accounts: ReloadableConfig<AccountsSnapshot>;
  merchantAliases: ReloadableConfig<MerchantAliasesSnapshot>;
  categoryRules: ReloadableConfig<CategoryRulesSnapshot>;
  anomalyRules: ReloadableConfig<AnomalySnapshot>;
}

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: LoggerPort;
  rules?: Partial<RuleSources>;
  storage?: StoragePort;
  historyProvider?: HistoryProviderPort;
  clock?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: LoggerPort;
  readonly rules: RuleSources;

  readonly promoFilter: KeywordPromoFilter;
  readonly bankIdentifier: PatternBankIdentifier;
  readonly fieldExtractor: TemplateFieldExtractor;
  readonly accountResolver: CardAccountResolver;
  readonly merchantResolver: AliasMerchantResolver;
  readonly categorizer: RuleBasedCategorizer;
  readonly anomalyDetector: HistoryAnomalyDetector;
  readonly storage: StoragePort;
  readonly historyProvider: HistoryProviderPort;
  readonly processingService: MessageProcessingService;
  readonly configReloadService: ConfigReloadService;

  // Throws ConfigurationError when a rule file on disk is malformed.
  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const logger = overrides.logger ?? console;
    this.logger = logger;

    const fromDisk = <T>(definition: ConfigDefinition<T>): ReloadableConfig<T> =>
      ReloadableConfig.fromFile(definition, ruleFilePath(this.config, definition.source), logger);

    const rules = overrides.rules ?? {};
    this.rules = {
      promoKeywords: rules.promoKeywords ?? fromDisk(promoKeywordsConfig),
      bankPatterns: rules.bankPatterns ?? fromDisk(bankPatternsConfig),
      extractionTemplates: rules.extractionTemplates ?? fromDisk(extractionTemplatesConfig),
      accounts: rules.accounts ?? fromDisk(accountsConfig),
      merchantAliases: rules.merchantAliases ?? fromDisk(merchantAliasesConfig),
      categoryRules: rules.categoryRules ?? fromDisk(categoryRulesConfig),
      anomalyRules: rules.anomalyRules ?? fromDisk(anomalyRulesConfig),
    };

    this.promoFilter = new KeywordPromoFilter(this.rules.promoKeywords, logger);
    this.bankIdentifier = new PatternBankIdentifier(
      this.rules.bankPatterns,
      {
        fuzzyEnabled: this.config.bankIdentification.fuzzyEnabled,
        fuzzyThreshold: this.config.bankIdentification.fuzzyThreshold,
      },
      logger,
    );
    this.fieldExtractor = new TemplateFieldExtractor(this.rules.extractionTemplates, logger);
    this.accountResolver = new CardAccountResolver(this.rules.accounts, logger);
    this.merchantResolver = new AliasMerchantResolver(this.rules.merchantAliases);
    this.categorizer = new RuleBasedCategorizer(this.rules.categoryRules);
    this.anomalyDetector = new HistoryAnomalyDetector(this.rules.anomalyRules, logger);

    this.storage = overrides.storage ?? new InMemoryStorageAdapter(logger);
    this.historyProvider = overrides.historyProvider ?? new StorageHistoryProvider(this.storage);

    this.processingService = new MessageProcessingService({
      promoFilter: this.promoFilter,
      bankIdentifier: this.bankIdentifier,
      fieldExtractor: this.fieldExtractor,
      accountResolver: this.accountResolver,
      merchantResolver: this.merchantResolver,
      categorizer: this.categorizer,
      anomalyDetector: this.anomalyDetector,
      historyProvider: this.historyProvider,
      storage: this.storage,
      logger,
      clock: overrides.clock,
    });

    this.configReloadService = new ConfigReloadService(Object.values(this.rules), logger);
  }
}
