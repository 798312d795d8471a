export { JsonValueAdapter, plainJsonAdapter } from './adapter';

