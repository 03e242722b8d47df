import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { NiluClient } from "./services/nilu-client";

export * from "./services/nilu-client";
export * from "./services/table-flattener";
export { createNiluRoutes } from "./routes/nilu-routes";
export { createApp } from "./app";

type FetchHandler = {
  fetch: (request: Request) => Response | Promise<Response>;
};

// Converts Node's req/res to the Fetch API Request/Response Hono expects
function serve(app: FetchHandler, port: number) {
  const server = createServer(
    async (req: IncomingMessage, res: ServerResponse) => {
      try {
        const url = new URL(
          req.url || "/",
          `http://${req.headers.host || "localhost"}`
        );

        const headers = new Headers();
        Object.entries(req.headers).forEach(([key, value]) => {
          if (value)
            headers.set(key, Array.isArray(value) ? value.join(", ") : value);
        });

        // Only GET and OPTIONS are routed, so there is never a body to forward
        const request = new Request(url.toString(), {
          method: req.method || "GET",
          headers,
        });

        const response = await app.fetch(request);

        res.statusCode = response.status;
        response.headers.forEach((value, key) => {
          res.setHeader(key, value);
        });
        res.end(await response.text());
      } catch (error) {
        console.error("Server error:", error);

        res.statusCode = 500;
        res.setHeader("Content-Type", "application/json");
        res.end(
          JSON.stringify({
            error: "Internal Server Error",
            message: error instanceof Error ? error.message : String(error),
          })
        );
      }
    }
  );

  server.listen(port, () => {
    console.log(`Server is running on http://localhost:${port}`);
  });

  return server;
}

// Only start the server if this file is executed directly
if (require.main === module) {
  const config = loadConfig();
  console.log(`Server is starting on port ${config.port}...`);
  console.log(`Forwarding requests to ${config.apiBaseUrl}`);

  const client = new NiluClient({ baseUrl: config.apiBaseUrl });
  serve(createApp(client, config), config.port);
}
