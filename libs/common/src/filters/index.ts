export { AllExceptionsFilter } from './all-exceptions.filter';
