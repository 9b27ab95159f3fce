export { namespace } from './namespace.js';
export { pod } from './pod.js';
