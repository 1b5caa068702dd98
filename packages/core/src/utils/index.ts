export { errorCode, errorMessage } from './error_utils';
