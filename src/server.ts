#!/usr/bin/env node
import express from "express";
import router from "./routes";
import { getPort, SERVER } from "./config/constants";
import { loadDocumentSpecCatalogue } from "./services/documentSpecService";

const app = express();

// Request logging middleware
app.use((req, res, next) => {
  const start = Date.now();

  // Log when response is finished
  res.on("finish", () => {
    const duration = Date.now() - start;
    const statusColor = res.statusCode >= 500 ? "\x1b[31m" : // Red for 5xx
                       res.statusCode >= 400 ? "\x1b[33m" : // Yellow for 4xx
                       res.statusCode >= 300 ? "\x1b[36m" : // Cyan for 3xx
                       "\x1b[32m"; // Green for 2xx
    const reset = "\x1b[0m";

    console.log(
      `${req.method} ${req.originalUrl} ${statusColor}${res.statusCode}${reset} ${duration}ms`
    );
  });

  next();
});

app.use(express.json({ limit: SERVER.JSON_BODY_LIMIT }));
app.use("/api", router);

const PORT = getPort();

const start = async () => {
  // A malformed catalogue stops startup
  const specs = await loadDocumentSpecCatalogue();
  console.log(`Loaded ${specs.length} document specs`);
  app.listen(PORT, () => console.log(`Server running on port ${PORT}`));
};

// Only start server if this file is run directly (not imported for testing)
if (require.main === module) {
  start().catch((err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}

// Export app for testing
export { app };
