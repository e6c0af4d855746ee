import { promises as fs } from "node:fs";
import http from "node:http";
import https from "node:https";
import type { Server, Socket } from "node:net";
import { URL } from "node:url";
import { AuthorizationError, ConfigError, SpotkeyError } from "../errors.js";
import { debug } from "../utils/log.js";

export const CALLBACK_PATH = "/callback";
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_SHUTDOWN_GRACE_MS = 1000;

export type TlsMaterial = {
  cert: string | Buffer;
  key: string | Buffer;
};

export type CallbackServer = {
  redirectUri: string;
  codePromise: Promise<string>;
  close(): Promise<void>;
  isListening(): boolean;
};

function createDeferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export async function loadTlsMaterial(
  certFile: string,
  keyFile: string
): Promise<TlsMaterial> {
  try {
    const [cert, key] = await Promise.all([
      fs.readFile(certFile),
      fs.readFile(keyFile),
    ]);
    return { cert, key };
  } catch (err) {
    throw new ConfigError(
      `Cannot read TLS certificate (${certFile}) or key (${keyFile}) for the callback listener: ${String(err)}`
    );
  }
}

export async function startCallbackServer(
  expectedState: string,
  options: {
    port: number;
    host?: string;
    tls?: TlsMaterial | null;
    shutdownGraceMs?: number;
  }
): Promise<CallbackServer> {
  const host = options.host ?? DEFAULT_HOST;
  const scheme = options.tls ? "https" : "http";
  const graceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  const deferred = createDeferred<string>();
  // the caller races this promise; a rejection after it lost the race is expected
  deferred.promise.catch(() => undefined);

  const respond = (
    res: http.ServerResponse,
    status: number,
    message: string
  ) => {
    res.writeHead(status, {
      "content-type": "text/plain; charset=utf-8",
      connection: "close",
    });
    res.end(message);
  };

  const handler: http.RequestListener = (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `${scheme}://${host}`);
      if (req.method !== "GET" || url.pathname !== CALLBACK_PATH) {
        respond(res, 404, "Not found");
        return;
      }
      if (url.searchParams.get("state") !== expectedState) {
        respond(res, 400, "State mismatch. Restart the login from the CLI.");
        deferred.reject(
          new AuthorizationError(
            "state_mismatch",
            "OAuth state mismatch in authorization callback."
          )
        );
        return;
      }
      const code = url.searchParams.get("code");
      if (!code) {
        const providerError = url.searchParams.get("error");
        respond(res, 400, "Authorization failed. Return to the CLI.");
        deferred.reject(
          new AuthorizationError(
            "missing_code",
            providerError
              ? `Authorization was not granted: ${providerError}.`
              : "No authorization code in callback."
          )
        );
        return;
      }
      respond(res, 200, "Authorization successful! You can close this window.");
      deferred.resolve(code);
    } catch (err) {
      if (!res.headersSent) {
        respond(res, 500, "Internal error.");
      }
      deferred.reject(err);
    }
  };

  const server = options.tls
    ? https.createServer({ cert: options.tls.cert, key: options.tls.key }, handler)
    : http.createServer(handler);
  const netServer: Server = server;
  const sockets = new Set<Socket>();
  netServer.on("connection", (socket: Socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });

  let closing: Promise<void> | null = null;
  const close = () => {
    if (!closing) {
      closing = new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          for (const socket of sockets) {
            socket.destroy();
          }
        }, graceMs);
        timer.unref();
        netServer.close(() => {
          clearTimeout(timer);
          debug("Authorization callback listener closed.");
          resolve();
        });
        server.closeIdleConnections();
      });
    }
    return closing;
  };

  await new Promise<void>((resolve, reject) => {
    const onError = (err: unknown) => {
      reject(err);
    };
    netServer.once("error", onError);
    netServer.listen(options.port, host, () => {
      netServer.off("error", onError);
      resolve();
    });
  }).catch((err: unknown) => {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "EADDRINUSE") {
      throw new SpotkeyError(
        "port_in_use",
        `OAuth callback port ${options.port} is already in use. Close the other process using it or set SPOTKEY_LOCAL_PORT.`,
        { cause: err }
      );
    }
    throw err;
  });

  const address = netServer.address();
  const port =
    address && typeof address === "object" ? address.port : options.port;
  return {
    redirectUri: `${scheme}://${host}:${port}${CALLBACK_PATH}`,
    codePromise: deferred.promise,
    close,
    isListening: () => netServer.listening,
  };
}
