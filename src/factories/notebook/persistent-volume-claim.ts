/**
 * Notebook PVC Factory
 */

import { STORAGE_CLASS_ANNOTATION } from '../../core/constants.js';
import { getComponentLogger } from '../../core/logging/index.js';
import type { PersistentVolumeClaimResource } from '../../core/types/kubernetes.js';
import { persistentVolumeClaim } from '../kubernetes/storage/persistent-volume-claim.js';
import type { NotebookPvcConfig } from './types.js';

const logger = getComponentLogger('notebook-pvc-factory');

/**
 * Creates the claim backing a user's home volume.
 *
 * Labels and annotations are always present, so callers can add to them
 * afterwards without checking.
 */
export function makePvc(config: NotebookPvcConfig): PersistentVolumeClaimResource {
  const annotations: Record<string, string> = { ...config.annotations };
  if (config.storageClass) {
    annotations[STORAGE_CLASS_ANNOTATION] = config.storageClass;
  }

  const labels: Record<string, string> = {};
  Object.assign(labels, config.labels);

  const result = persistentVolumeClaim({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      annotations,
      labels,
    },
    spec: {
      accessModes: [...config.accessModes],
      resources: {
        requests: { storage: config.storage },
      },
    },
  });

  logger.debug('Built notebook volume claim', {
    name: config.name,
    storage: config.storage,
    storageClass: config.storageClass,
  });
  return result;
}
