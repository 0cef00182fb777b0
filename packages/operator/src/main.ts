/**
 * Operator daemon entry point.
 *
 * Loads configuration, wires the real K8s client into the reconciler,
 * and starts watching MarimoNotebook resources.
 */
import * as k8s from '@kubernetes/client-node';
import { createLogger, initTelemetry, shutdownTelemetry } from '@notebook-operator/core';

import { loadOperatorConfig } from './config.js';
import { NotebookController } from './controller.js';
import { startHealthServer } from './health.js';
import { createKubeClient } from './kube-client.js';
import { NotebookReconciler } from './reconciler.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const config = loadOperatorConfig();

  const telemetry = initTelemetry({
    serviceName: 'notebook-operator',
    otlpEndpoint: config.otlpEndpoint,
  });
  log.info({ telemetry }, 'starting notebook operator');

  const kc = new k8s.KubeConfig();
  kc.loadFromCluster();

  const reconciler = new NotebookReconciler(createKubeClient(kc), config);
  const controller = new NotebookController(kc, reconciler, {
    namespace: config.watchNamespace,
  });

  const health = startHealthServer(config.healthPort, () => controller.isReady());

  await controller.start();
  log.info('controller running');

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'shutting down');
    health.close();
    controller
      .stop()
      .then(() => shutdownTelemetry())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'fatal error');
  process.exit(1);
});
