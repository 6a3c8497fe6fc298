import type { BankType, FormatRegistry, StatementFormat } from './types';
import { axisCreditFormat } from './axisCredit';
import { axisSavingsFormat } from './axisSavings';

const MIN_CONFIDENCE = 0.5;

/**
 * Format Registry
 * Holds the available statement formats and picks one for a document
 */
export class StatementFormatRegistry implements FormatRegistry {
  formats: StatementFormat[] = [];

  constructor(formats: StatementFormat[] = [axisCreditFormat, axisSavingsFormat]) {
    for (const format of formats) {
      this.register(format);
    }
  }

  register(format: StatementFormat): void {
    const existing = this.formats.find((f) => f.bankType === format.bankType);
    if (existing) {
      console.warn(`[format_registry] Format for ${format.bankType} already registered, replacing...`);
      this.formats = this.formats.filter((f) => f.bankType !== format.bankType);
    }
    this.formats.push(format);
  }

  get(bankType: BankType): StatementFormat | null {
    return this.formats.find((f) => f.bankType === bankType) ?? null;
  }

  detect(firstPageText: string, fileName: string): BankType {
    let best: StatementFormat | null = null;
    let bestConfidence = 0;

    for (const format of this.formats) {
      const confidence = format.canParse(firstPageText, fileName);
      if (confidence > bestConfidence) {
        bestConfidence = confidence;
        best = format;
      }
    }

    if (best && bestConfidence >= MIN_CONFIDENCE) {
      return best.bankType;
    }
    return 'other';
  }

  getSupportedBanks(): Array<{ bankType: BankType; name: string }> {
    return this.formats.map((f) => ({
      bankType: f.bankType,
      name: f.name,
    }));
  }
}

export const parserRegistry = new StatementFormatRegistry();
