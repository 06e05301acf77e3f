export { flattenValidationErrors, GlobalValidationPipe } from './global-validation.pipe'
