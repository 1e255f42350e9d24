import { log } from "./log";
import { isDatabaseConfigured } from "./db";
import { storage } from "./storage";
import { createApp } from "./app";

const { server } = createApp();

const port = process.env.PORT ? Number.parseInt(process.env.PORT, 10) : 8000;
const host = process.env.HOST ?? "0.0.0.0";

const startServer = async () => {
  if (isDatabaseConfigured()) {
    try {
      await storage.initializeBills();
      log("🧾 Bill tables ready");
    } catch (error) {
      console.error("❌ Failed to initialize bill tables:", error);
      process.exit(1);
    }
  } else {
    log("⚠️ DATABASE_URL is not set; bill endpoints will answer 503");
  }

  server.listen({ port, host }, () => {
    log(`🚀 Server running on http://${host}:${port}`);
  });
};

void startServer();
