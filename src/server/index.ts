export { ApiServer } from './express.js';
