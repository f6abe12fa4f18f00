export { Entity } from './base-classes/entity.js';
export {
  ConflictError,
  DomainError,
  DuplicatePhoneError,
  NotFoundError,
  ValidationError,
} from './errors/domain-error.js';
