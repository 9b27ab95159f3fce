/**
 * Notebook Pod Factory
 *
 * Builds the pod running a single user's notebook server.
 */

import type {
  V1Container,
  V1LocalObjectReference,
  V1PodSecurityContext,
  V1ResourceRequirements,
} from '@kubernetes/client-node';
import { NOTEBOOK_CONTAINER_NAME, NOTEBOOK_PORT_NAME } from '../../core/constants.js';
import { getComponentLogger } from '../../core/logging/index.js';
import type { PodResource } from '../../core/types/kubernetes.js';
import { toInteger } from '../../utils/coercion.js';
import { pod } from '../kubernetes/core/pod.js';
import { copyNonEmpty } from '../shared.js';
import type { NotebookPodConfig } from './types.js';

const logger = getComponentLogger('notebook-pod-factory');

function securityContext(config: NotebookPodConfig): V1PodSecurityContext {
  const context: V1PodSecurityContext = {};

  if (config.fsGid !== undefined) {
    context.fsGroup = toInteger(config.fsGid, 'Pod', config.name, 'fsGid');
  }
  if (config.runAsUid !== undefined) {
    context.runAsUser = toInteger(config.runAsUid, 'Pod', config.name, 'runAsUid');
  }
  if (config.supplementalGids && config.supplementalGids.length > 0) {
    context.supplementalGroups = config.supplementalGids.map((gid, index) =>
      toInteger(gid, 'Pod', config.name, `supplementalGids.${index}`)
    );
  }

  return context;
}

function setQuantities(target: Record<string, string>, extra?: Record<string, string>): void {
  for (const [resource, quantity] of Object.entries(extra ?? {})) {
    if (quantity) {
      target[resource] = quantity;
    }
  }
}

/**
 * Requests and limits only carry entries whose input is set; a zero or empty
 * value would be sent as an explicit quantity. Extra entries follow the same
 * rule and are merged after cpu and memory.
 */
function resourceRequirements(config: NotebookPodConfig): V1ResourceRequirements {
  const requests: Record<string, string> = {};
  if (config.cpuGuarantee) {
    requests.cpu = String(config.cpuGuarantee);
  }
  if (config.memGuarantee) {
    requests.memory = config.memGuarantee;
  }

  const limits: Record<string, string> = {};
  if (config.cpuLimit) {
    limits.cpu = String(config.cpuLimit);
  }
  if (config.memLimit) {
    limits.memory = config.memLimit;
  }

  setQuantities(requests, config.extraResourceGuarantees);
  setQuantities(limits, config.extraResourceLimits);

  return { requests, limits };
}

function notebookContainer(config: NotebookPodConfig): V1Container {
  return {
    name: NOTEBOOK_CONTAINER_NAME,
    image: config.image,
    ...(config.workingDir !== undefined && { workingDir: config.workingDir }),
    ports: [{ name: NOTEBOOK_PORT_NAME, containerPort: config.port }],
    env: Object.entries(config.env ?? {}).map(([name, value]) => ({ name, value })),
    ...(config.cmd && { args: [...config.cmd] }),
    imagePullPolicy: config.imagePullPolicy,
    ...(config.lifecycleHooks && { lifecycle: config.lifecycleHooks }),
    resources: resourceRequirements(config),
    ...(config.volumeMounts && { volumeMounts: [...config.volumeMounts] }),
  };
}

/**
 * Creates the pod for a user's notebook server
 *
 * @param config - Spawn parameters; `name` must already be a valid DNS label
 * @returns Pod with a single `notebook` container plus any configured sidecars
 * @throws ValidationError when a uid or gid is not numeric
 */
export function makePod(config: NotebookPodConfig): PodResource {
  const imagePullSecrets: V1LocalObjectReference[] | undefined =
    config.imagePullSecret !== undefined ? [{ name: config.imagePullSecret }] : undefined;
  const nodeSelector = copyNonEmpty(config.nodeSelector);

  const result = pod({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      labels: { ...config.labels },
      ...(config.annotations && { annotations: { ...config.annotations } }),
    },
    spec: {
      securityContext: securityContext(config),
      ...(imagePullSecrets && { imagePullSecrets }),
      ...(nodeSelector && { nodeSelector }),
      ...(config.serviceAccount
        ? { serviceAccountName: config.serviceAccount }
        : { automountServiceAccountToken: false }),
      containers: [notebookContainer(config), ...(config.extraContainers ?? [])],
      ...(config.initContainers && { initContainers: [...config.initContainers] }),
      ...(config.volumes && { volumes: [...config.volumes] }),
      ...(config.tolerations &&
        config.tolerations.length > 0 && { tolerations: [...config.tolerations] }),
      ...(config.priorityClassName && { priorityClassName: config.priorityClassName }),
      ...(config.schedulerName && { schedulerName: config.schedulerName }),
    },
  });

  logger.debug('Built notebook pod', { name: config.name, namespace: config.namespace });
  return result;
}
