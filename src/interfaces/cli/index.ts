export { parseCliArgs } from './args.js';
