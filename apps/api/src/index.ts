import "dotenv/config";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { connectDatabase, disconnectDatabase } from "./db/connect.js";
import { createMongoRepositories } from "./repositories/index.js";
import { createServices } from "./services/index.js";

await connectDatabase();

const services = createServices(createMongoRepositories(), { saltRounds: env.BCRYPT_SALT_ROUNDS });
const app = createApp(services, { corsOrigin: env.CORS_ORIGIN, logRequests: env.NODE_ENV !== "test" });
const server = app.listen(env.PORT, () => {
  console.log(`[api] running on http://localhost:${env.PORT}`);
});

async function shutdown(signal: string) {
  console.log(`[api] ${signal} received, closing`);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await disconnectDatabase();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("[api] shutdown failed", error);
      process.exitCode = 1;
    });
  });
}
