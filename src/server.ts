// src/server.ts
import "dotenv/config";
import http from "http";
import index from "./index";
import { getConfiguredApiKey } from "./config/gemini-config";
import { getPort } from "./config/app-config";

const PORT = getPort();

const server = http.createServer(index);

function bootstrap() {
  if (!getConfiguredApiKey()) {
    // Handlers fail closed with 500 until a key is provided
    console.warn("[homework-ai] GOOGLE_API_KEY is not set; generation requests will fail.");
  }

  server.listen(PORT, () => {
    console.log("[homework-ai] HTTP server listening on http://localhost:" + PORT);
  });

  server.on("error", (err) => {
    console.error("[homework-ai] Fatal HTTP startup error", err);
    process.exit(1);
  });
}

bootstrap();
