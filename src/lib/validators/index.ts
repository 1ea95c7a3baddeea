// Validators index - numeric plausibility and citation checks applied to phase output

export {
  parseMarketValue,
  parsePercent,
  boundGrowthRate,
  boundMarketSize,
  boundPercentage,
} from './market-figures';
export type { PlausibilityBounds, BoundedValue } from './market-figures';

export { extractInlineCitations, checkCitations } from './citations';
export type { CitationCheck } from './citations';
