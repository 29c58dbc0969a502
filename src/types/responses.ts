/**
 * Output types shared by the formatters and the CLI
 */

/**
 * Verbosity level for rendered results
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export const VERBOSITY_LEVELS: readonly Verbosity[] = ['minimal', 'standard', 'detailed'];
