/**
 * Cost tracking
 */

export { CostTracker, type CostSummary, type WorkloadEstimate } from './cost-tracker.js';

export {
  type Money,
  MONEY_SCALE,
  ZERO,
  parseMoney,
  priceUnits,
  unitRate,
  divideRounded,
  sumMoney,
  formatMoney,
  moneyToNumber,
} from './money.js';
