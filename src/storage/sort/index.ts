export {
  sortWith,
  sortByKey,
  sortByValue,
  sortByExpiry,
  compareByKey,
  compareByValue,
  compareByExpiry,
} from './SortOptions';
