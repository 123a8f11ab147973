import type { BankSelection, ExtractedFields } from '../../domain/entities/ExtractionTemplate.js';

export interface FieldExtractorPort {
  extract(text: string, selection: BankSelection): ExtractedFields;
  supportedBanks(): string[];
}
