import { registerAs } from '@nestjs/config';

/**
 * URL registry and analysis recorder settings
 */
export default registerAs('registry', () => ({
  /**
   * Provenance stored when a submission does not name one
   * Default: manual
   */
  defaultSource: process.env.URL_DEFAULT_SOURCE || 'manual',

  /**
   * Rows fetched per round trip while iterating an analysis history
   * Default: 50
   */
  historyBatchSize: parseInt(
    process.env.ANALYSIS_HISTORY_BATCH_SIZE ?? '50',
    10,
  ),
}));
