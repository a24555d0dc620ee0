import { createServer } from "http";
import { Server } from "socket.io";
import type { Socket } from "socket.io";
import * as log from "./lib/logger";
import type { SecretStore } from "./lib/secret-store";
import apps from "./routes/apps";
import deploy from "./routes/deploy";
import type { RouteServices } from "./routes/respond";

// socket.io forwards `data` to the client alongside the message.
class UnauthorizedError extends Error {
  readonly data = { code: "auth/401" };

  constructor() {
    super("Unauthorized User.");
  }
}

// Handshake auth against the admin credentials in hms_config
export const authenticate = (store: SecretStore) =>
  (socket: Socket, next: (err?: Error) => void) => {
    const auth: Record<string, unknown> = socket.handshake.auth;
    const username = auth.username;
    const password = auth.password;

    if (typeof username !== "string" || typeof password !== "string" || !username || !password) {
      return next(new UnauthorizedError());
    }

    if (store.verifyHmsAdmin(username, password)) {
      socket.data.username = username;
      return next();
    }

    next(new UnauthorizedError());
  };

// Builds the operator API without listening, so callers pick the port.
export function createOperatorServer(services: RouteServices) {
  const server = createServer();
  const io = new Server(server, { cors: { origin: "*" } });

  io.use(authenticate(services.store));

  io.on("connection", (socket) => {
    log.info(`${socket.id}-> Operator connected`);

    try {
      apps(io, socket, services);
      deploy(io, socket, services);
    } catch (error) {
      console.error(error);
    }

    socket.on("disconnect", () => {
      log.info(`${socket.id}-> Operator disconnected`);
    });
  });

  return { server, io };
}

export function startServer(services: RouteServices, port: number) {
  const { server, io } = createOperatorServer(services);
  server.listen(port, () => {
    log.success(`Operator API listening on port ${port}`);
  });
  return io;
}
