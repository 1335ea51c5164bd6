export {
  amount,
  percentage,
  date,
  freeText,
  missing,
  comparableValue,
  withProvenance,
  allMissing,
  mapFields,
  isMissing,
  formatAmount,
  renderFieldValue,
} from './values';

export {
  findAmounts,
  parseAmount,
  findPercentages,
  parsePercentage,
  findDates,
  parseDate,
  normalizeText,
  splitSentences,
  type AmountMatch,
  type PercentageMatch,
  type DateMatch,
} from './parsing';
