// Period filtering

export {
  filterPeriod,
  matchesCountry,
  matchesCategory,
  matchesKeyword,
  isWithinWindow,
  isAllCategories,
} from './period.js';

export { parseDayFirstDate, expandTwoDigitYear } from './dates.js';
