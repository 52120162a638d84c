/**
 * In-process HTTP server used by the download and pipeline tests
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

export const PNG_BODY = Buffer.from("png-bytes");
export const JPEG_BODY = Buffer.from("jpeg-bytes");

export interface ImageServer {
  baseUrl: string;
  hits: Map<string, number>;
  userAgents: string[];
  maxInFlight: number;
  reset(): void;
  close(): Promise<void>;
}

type Route = (req: IncomingMessage, res: ServerResponse, hit: number) => void;

const routes: Record<string, Route> = {
  "/ok.png": (_req, res) => {
    res.writeHead(200, { "Content-Type": "image/png" });
    res.end(PNG_BODY);
  },
  "/photo.jpg": (_req, res) => {
    res.writeHead(200, { "Content-Type": "image/jpeg; charset=binary" });
    res.end(JPEG_BODY);
  },
  "/big.png": (_req, res) => {
    res.writeHead(200, { "Content-Type": "image/png", "Content-Length": "1024" });
    res.end(Buffer.alloc(1024, 1));
  },
  "/stream.png": (_req, res) => {
    res.writeHead(200, { "Content-Type": "image/png" });
    res.write(Buffer.alloc(1024, 1));
    res.end();
  },
  "/page.html": (_req, res) => {
    res.writeHead(200, { "Content-Type": "text/html" });
    res.end("<html></html>");
  },
  "/no-type": (_req, res) => {
    res.writeHead(200);
    res.end("x");
  },
  "/missing.png": (_req, res) => {
    res.writeHead(404);
    res.end();
  },
  "/flaky.png": (_req, res, hit) => {
    if (hit <= 2) {
      res.writeHead(500);
      res.end();
      return;
    }
    res.writeHead(200, { "Content-Type": "image/png" });
    res.end(PNG_BODY);
  },
  "/always-500.png": (_req, res) => {
    res.writeHead(500);
    res.end();
  },
  "/rate-limited.png": (_req, res) => {
    res.writeHead(429);
    res.end();
  },
  "/slow.png": (_req, res) => {
    setTimeout(() => {
      res.writeHead(200, { "Content-Type": "image/png" });
      res.end(PNG_BODY);
    }, 300);
  },
};

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("server has no port"));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Start a server with fixed routes. Paths under `/track/` answer with a
 * PNG after 30ms and record the peak number of concurrent requests.
 */
export async function startImageServer(): Promise<ImageServer> {
  let inFlight = 0;

  const state = {
    hits: new Map<string, number>(),
    userAgents: [] as string[],
    maxInFlight: 0,
  };

  const server = createServer((req, res) => {
    const path = req.url ?? "/";
    const hit = (state.hits.get(path) ?? 0) + 1;
    state.hits.set(path, hit);
    state.userAgents.push(req.headers["user-agent"] ?? "");

    if (path.startsWith("/track/")) {
      inFlight++;
      state.maxInFlight = Math.max(state.maxInFlight, inFlight);
      setTimeout(() => {
        inFlight--;
        res.writeHead(200, { "Content-Type": "image/png" });
        res.end(PNG_BODY);
      }, 30);
      return;
    }

    const route = routes[path];
    if (!route) {
      res.writeHead(404);
      res.end();
      return;
    }
    route(req, res, hit);
  });

  const port = await listen(server);

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    get hits() {
      return state.hits;
    },
    get userAgents() {
      return state.userAgents;
    },
    get maxInFlight() {
      return state.maxInFlight;
    },
    reset() {
      state.hits = new Map();
      state.userAgents = [];
      state.maxInFlight = 0;
    },
    close: () => close(server),
  };
}

/**
 * A URL on a port that nothing listens on
 */
export async function closedPortUrl(): Promise<string> {
  const server = createServer();
  const port = await listen(server);
  await close(server);
  return `http://127.0.0.1:${port}/gone.png`;
}
