export { errorHandler, createError } from './errorHandler';
export { requireApiKey } from './auth';
