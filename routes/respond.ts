import type { Server, Socket } from "socket.io";
import { HmsError, errorMessage } from "../lib/errors";
import type { Services } from "../lib/services";

export type AckResponse<T> =
  | { success: true; data: T }
  | { success: false; error: string; code?: string };

export type Ack<T> = (response: AckResponse<T>) => void;

export type Emit = (event: string, payload: unknown) => void;

export type RouteServices = Pick<Services, 'store' | 'orchestrator' | 'health'>;

export type Route = (server: Server, socket: Socket, services: RouteServices) => void;

// Clients may emit without an ack; there is nobody to answer then.
export const reply = <T>(callback: Ack<T> | undefined, response: AckResponse<T>) => {
  if (typeof callback === 'function') {
    callback(response);
  }
};

export const fail = <T>(callback: Ack<T> | undefined, context: string, error: unknown) => {
  console.error(`${context} error:`, errorMessage(error));
  reply(callback, {
    success: false,
    error: errorMessage(error),
    code: error instanceof HmsError ? error.code : undefined
  });
};
