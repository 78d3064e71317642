import "dotenv/config";
import path from "path";
import { fileURLToPath } from "url";
import express from "express";
import multer from "multer";
import { loadServerConfig } from "../shared/run_config.js";
import { handleAnalyzeUpload } from "./analyze_handler.js";

const config = loadServerConfig();

const app = express();
app.use(express.json());

const upload = multer({ storage: multer.memoryStorage() });

// ── GET /health ─────────────────────────────────────────────────────
app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

// ── POST /v1/analyze ────────────────────────────────────────────────
app.post("/v1/analyze", upload.single("file"), (req, res) => {
  const targetLow: unknown = req.body?.targetLow;
  const format = req.query.format;
  const result = handleAnalyzeUpload(
    {
      file: req.file,
      targetLow: typeof targetLow === "string" ? targetLow : undefined,
      format: typeof format === "string" ? format : undefined,
    },
    config.targetLow
  );

  if (result.status >= 500) {
    console.error(`POST /v1/analyze failed: ${JSON.stringify(result.body)}`);
  }

  if (result.kind === "csv") {
    res.status(result.status);
    res.attachment(result.fileName);
    res.type("text/csv; charset=utf-8");
    res.send(result.body);
    return;
  }
  res.status(result.status).json(result.body);
});

// ── Start server ────────────────────────────────────────────────
export function startServer() {
  return app.listen(config.port, () => {
    console.log(`Lot risk API running on port ${config.port} (target low ${config.targetLow})`);
  });
}

export { app };

// Start if run directly
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  startServer();
}
