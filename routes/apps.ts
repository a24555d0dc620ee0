import type { ApplicationRecord, DeploymentRow } from "../lib/models";
import { fail, reply } from "./respond";
import type { Ack, Route, RouteServices } from "./respond";

// List every managed app (secrets are never part of a record)
export const listApps = (services: RouteServices) =>
  async (_data: unknown, callback?: Ack<ApplicationRecord[]>) => {
    try {
      reply(callback, { success: true, data: services.store.listApps() });
    } catch (error) {
      fail(callback, 'List apps', error);
    }
  };

// Get one enabled app
export const getApp = (services: RouteServices) =>
  async (data: { appKey?: string }, callback?: Ack<ApplicationRecord>) => {
    try {
      if (!data?.appKey) {
        reply(callback, { success: false, error: 'appKey is required' });
        return;
      }
      reply(callback, { success: true, data: services.store.getApp(data.appKey) });
    } catch (error) {
      fail(callback, 'Get app', error);
    }
  };

// Recent deployment outcomes, newest first
export const getAppHistory = (services: RouteServices) =>
  async (data: { appKey?: string; limit?: number }, callback?: Ack<DeploymentRow[]>) => {
    try {
      if (!data?.appKey) {
        reply(callback, { success: false, error: 'appKey is required' });
        return;
      }
      const limit = Math.min(Math.max(data.limit ?? 10, 1), 100);
      reply(callback, { success: true, data: services.store.listDeployments(data.appKey, limit) });
    } catch (error) {
      fail(callback, 'Get app history', error);
    }
  };

const apps: Route = (server, socket, services) => {
  socket.on('app:list', listApps(services));
  socket.on('app:get', getApp(services));
  socket.on('app:history', getAppHistory(services));
};

export default apps;
