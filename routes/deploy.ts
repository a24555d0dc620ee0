import type { DeployEvent, DeploymentResult, StepStatus } from "../lib/deployment";
import type { HealthReport } from "../lib/health";
import type { DeployMode } from "../lib/models";
import { fail, reply } from "./respond";
import type { Ack, Emit, Route, RouteServices } from "./respond";

const MODES: readonly DeployMode[] = ['first_time', 'code_and_migrate', 'migrate_only'];

const STATUS_MARKS: Record<StepStatus, string> = { succeeded: '✓', failed: '✗', skipped: '-' };

function isDeployMode(value: unknown): value is DeployMode {
  return MODES.some((mode) => mode === value);
}

function describe(event: DeployEvent): string {
  switch (event.type) {
    case 'step-start':
      return `▶ [${event.index}/${event.total}] ${event.name}`;
    case 'step-end':
      return `${STATUS_MARKS[event.result.status]} ${event.result.name}: ${event.result.detail}`;
    case 'output':
      return event.line;
  }
}

// Run a deployment, streaming progress to the requesting socket as it happens
export const runDeploy = (services: RouteServices, emit: Emit) =>
  async (
    data: { appKey?: string; mode?: string; skipHealthCheck?: boolean; baseUrl?: string },
    callback?: Ack<DeploymentResult>
  ) => {
    const appKey = data?.appKey;
    const mode = data?.mode ?? 'code_and_migrate';
    if (!appKey) {
      reply(callback, { success: false, error: 'appKey is required' });
      return;
    }
    if (!isDeployMode(mode)) {
      reply(callback, { success: false, error: `mode must be one of ${MODES.join(', ')}` });
      return;
    }

    try {
      const result = await services.orchestrator.deploy(appKey, mode, {
        runHealthCheck: !data.skipHealthCheck,
        healthBaseUrl: data.baseUrl,
        onEvent: (event) => {
          emit('deploy:log-stream', {
            appKey,
            event: event.type,
            newMessage: describe(event),
            timestamp: new Date().toISOString()
          });
        }
      });

      emit('deploy:log-stream-end', {
        appKey,
        finalStatus: result.succeeded ? 'succeeded' : 'failed',
        failedStep: result.failedStep?.stepName
      });
      reply(callback, { success: true, data: result });
    } catch (error) {
      emit('deploy:log-stream-end', { appKey, finalStatus: 'failed' });
      fail(callback, 'Deploy', error);
    }
  };

export const runHealthCheck = (services: RouteServices) =>
  async (data: { appKey?: string; baseUrl?: string }, callback?: Ack<HealthReport>) => {
    try {
      if (!data?.appKey) {
        reply(callback, { success: false, error: 'appKey is required' });
        return;
      }
      const report = await services.health.healthCheck(data.appKey, { baseUrl: data.baseUrl });
      reply(callback, { success: true, data: report });
    } catch (error) {
      fail(callback, 'Health check', error);
    }
  };

const deploy: Route = (server, socket, services) => {
  socket.on('deploy:run', runDeploy(services, (event, payload) => socket.emit(event, payload)));
  socket.on('deploy:health-check', runHealthCheck(services));
};

export default deploy;
