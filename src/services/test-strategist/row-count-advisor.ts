/**
 * Row-Count Advisor
 * Asks the text service how many rows each scenario deserves. Advisory
 * only: every failure falls back to a fixed count.
 */

import type { TextCapability } from '../../llm/text-service.js';
import { requireTextService } from '../../llm/text-service.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { buildRowCountPrompt, ROW_COUNT_SYSTEM_PROMPT } from './prompts.js';
import { parseIntegerResponse } from './response-parser.js';
import type { TestPlan } from './types.js';

export const FALLBACK_ROWS_PER_SCENARIO = 3;

export interface RowCountAdvisorOptions {
  fallback?: number;

  /**
   * Upper bound applied to the recommendation
   */
  maxRowsPerScenario?: number;
}

export class RowCountAdvisor {
  private readonly logger: Logger;
  private readonly fallback: number;
  private readonly maxRowsPerScenario: number;

  constructor(
    private readonly capability: TextCapability,
    options: RowCountAdvisorOptions = {}
  ) {
    this.logger = createModuleLogger('services:row-count-advisor');
    this.fallback = options.fallback ?? FALLBACK_ROWS_PER_SCENARIO;
    this.maxRowsPerScenario = options.maxRowsPerScenario ?? 50;
  }

  /**
   * Recommended rows per scenario, always an integer >= 1
   */
  async advise(plan: TestPlan): Promise<number> {
    let response: string;
    try {
      const service = requireTextService(this.capability);
      response = await service.generate(buildRowCountPrompt(plan), {
        systemPrompt: ROW_COUNT_SYSTEM_PROMPT,
        temperature: 0,
        maxTokens: 16,
      });
    } catch (error) {
      this.logger.warn('Could not determine ideal row count, using fallback', {
        fallback: this.fallback,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback;
    }

    const parsed = parseIntegerResponse(response);
    if (!parsed.success) {
      this.logger.warn('Row count response was not an integer, using fallback', {
        fallback: this.fallback,
        error: parsed.error,
      });
      return this.fallback;
    }

    if (parsed.data < 1) {
      this.logger.warn('Row count recommendation below 1, using fallback', {
        recommended: parsed.data,
        fallback: this.fallback,
      });
      return this.fallback;
    }

    const rows = Math.min(parsed.data, this.maxRowsPerScenario);
    this.logger.info('Ideal row count determined', { recommended: parsed.data, rowsPerScenario: rows });
    return rows;
  }
}
