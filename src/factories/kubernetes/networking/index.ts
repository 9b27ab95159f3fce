export { endpoints } from './endpoints.js';
export { ingress } from './ingress.js';
export { service } from './service.js';
