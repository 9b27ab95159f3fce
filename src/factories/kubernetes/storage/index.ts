export { persistentVolumeClaim } from './persistent-volume-claim.js';
