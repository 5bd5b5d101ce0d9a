export { AppError } from './AppError';
export {
  EmptyContentError,
  StorageError,
  TransportError,
  REPORT_CONTENT_REQUIRED,
} from './reportErrors';
