import express, { type Express } from "express";
import type { Server } from "node:http";

export interface StubServer {
  url: string;
  close(): Promise<void>;
}

export async function listen(app: Express): Promise<StubServer> {
  const server = await new Promise<Server>((resolve) => {
    const started = app.listen(0, "127.0.0.1", () => resolve(started));
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new Error("stub server has no TCP address");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/** In-process HTTP stand-in for the provider or marketplace APIs. */
export function startStub(configure: (app: Express) => void): Promise<StubServer> {
  const app = express();
  app.use(express.json());
  configure(app);
  return listen(app);
}
