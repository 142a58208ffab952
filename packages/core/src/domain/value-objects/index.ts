export { Address } from './Address.ts';
