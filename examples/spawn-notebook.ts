/**
 * Spawn Notebook Example
 *
 * Builds everything one user's notebook needs and prints it as YAML,
 * ready for `kubectl apply -f -`.
 */

import {
  makeIngress,
  makeNamespace,
  makePod,
  makePvc,
  routeResources,
  serializeResourcesToYaml,
} from '../src/index.js';

const namespace = 'jupyter-alice';
const labels = {
  heritage: 'jupyterhub',
  component: 'singleuser-server',
  'hub.jupyter.org/username': 'alice',
};

const claim = makePvc({
  name: 'claim-alice',
  namespace,
  storageClass: 'standard',
  accessModes: ['ReadWriteOnce'],
  storage: '10Gi',
  labels,
});

const pod = makePod({
  name: 'jupyter-alice',
  namespace,
  image: 'jupyter/base-notebook:latest',
  imagePullPolicy: 'IfNotPresent',
  port: 8888,
  cmd: ['jupyterhub-singleuser', '--ip=0.0.0.0', '--port=8888'],
  runAsUid: 1000,
  fsGid: 100,
  env: { JUPYTERHUB_USER: 'alice' },
  workingDir: '/home/jovyan',
  volumes: [{ name: 'home', persistentVolumeClaim: { claimName: 'claim-alice' } }],
  volumeMounts: [{ name: 'home', mountPath: '/home/jovyan' }],
  labels,
  cpuLimit: 2,
  cpuGuarantee: 0.5,
  memLimit: '2Gi',
  memGuarantee: '1Gi',
});

const route = makeIngress({
  name: 'route-alice',
  namespace: 'jupyterhub',
  routespec: '/user/alice/',
  target: 'http://10.0.0.5:8888',
  data: { user: 'alice', server_name: '' },
});

console.log(
  serializeResourcesToYaml([
    makeNamespace({ name: namespace, labels }),
    claim,
    pod,
    ...routeResources(route),
  ])
);
