export { quoteCurrency } from './quote.js';
export { formatDate, formatAmount, formatCostClause, positionStrings, flagPrefix } from './format.js';
