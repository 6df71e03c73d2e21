export { LoggingInterceptor } from './logging.interceptor';
