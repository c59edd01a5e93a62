export { ColorResolver, defaultColorResolver } from './ColorResolver.js';
