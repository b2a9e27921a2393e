import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';

const kc = new k8s.KubeConfig();
try {
  kc.loadFromDefault();
  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
  throw new Error(`Kubernetes configuration error: ${message}`);
}

export let k8sCoreApi = kc.makeApiClient(k8s.CoreV1Api);
export let k8sAppsApi = kc.makeApiClient(k8s.AppsV1Api);
export let k8sBatchApi = kc.makeApiClient(k8s.BatchV1Api);

export function listContexts(): string[] {
  return kc.getContexts().map(c => c.name);
}

export function getCurrentContext(): string {
  return kc.getCurrentContext();
}

// Rebuilds the API clients against another kubeconfig context
export function switchContext(name: string): void {
  if (!listContexts().includes(name)) {
    throw new Error(`Context "${name}" not found. Available contexts: ${listContexts().join(', ')}`);
  }
  kc.setCurrentContext(name);
  k8sCoreApi = kc.makeApiClient(k8s.CoreV1Api);
  k8sAppsApi = kc.makeApiClient(k8s.AppsV1Api);
  k8sBatchApi = kc.makeApiClient(k8s.BatchV1Api);
}
