export { Treasury } from './treasury.js';
