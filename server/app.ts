import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors, { type CorsOptions } from "cors";
import type { Server } from "http";

import { setupRoutes } from "./routes";
import { createCorsOptions } from "./corsConfig";
import { log } from "./log";
import { describeError, isRecord } from "./src/utils/inputs";

const LOG_LINE_LIMIT = 80;

const parseOrigins = (value?: string | null): string[] =>
  value
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean) ?? [];

type ParsedOrigin = {
  normalized: string;
  hostname: string;
};

const parseOriginValue = (origin: string): ParsedOrigin | null => {
  const trimmed = origin.trim();
  if (!trimmed) {
    return null;
  }

  try {
    const url = new URL(trimmed);
    const protocol = url.protocol.toLowerCase();
    if (protocol !== "http:" && protocol !== "https:") {
      return null;
    }

    const hostname = url.hostname.toLowerCase();
    const isHttps = protocol === "https:";
    const defaultPort = isHttps ? "443" : "80";
    const port = url.port && url.port !== defaultPort ? `:${url.port}` : "";

    return {
      normalized: `${protocol}//${hostname}${port}`,
      hostname,
    };
  } catch {
    const lower = trimmed.toLowerCase();
    return {
      normalized: lower,
      hostname: lower,
    };
  }
};

export type CorsState = {
  isOriginAllowed: (origin?: string | null) => boolean;
  allowedOrigins: string[];
  allowAnyOrigin: boolean;
  corsOptions: CorsOptions;
};

const buildCorsState = (): CorsState => {
  const allowedOrigins = Array.from(
    new Set([
      ...parseOrigins(process.env.CORS_ORIGINS),
      ...parseOrigins(process.env.CORS_ORIGIN),
      ...parseOrigins(process.env.CLIENT_URL),
    ]),
  );

  // Counter apps and label scanners call in from anywhere unless an
  // allow-list is configured.
  const allowAnyOrigin = allowedOrigins.length === 0 || allowedOrigins.includes("*");

  const normalizedAllowedOrigins = new Set(
    allowedOrigins
      .map((origin) => parseOriginValue(origin)?.normalized)
      .filter((value): value is string => Boolean(value)),
  );

  const isOriginAllowed = (origin?: string | null): boolean => {
    if (!origin || allowAnyOrigin) {
      return true;
    }

    const parsed = parseOriginValue(origin);
    if (!parsed) {
      return false;
    }

    return normalizedAllowedOrigins.has(parsed.normalized);
  };

  const corsOptions = createCorsOptions(isOriginAllowed);

  return {
    isOriginAllowed,
    allowedOrigins,
    allowAnyOrigin,
    corsOptions,
  };
};

const resolveErrorStatus = (err: unknown): number => {
  if (!isRecord(err)) {
    return 500;
  }

  const status = err.status ?? err.statusCode;
  return typeof status === "number" && status >= 400 && status < 600 ? status : 500;
};

export type CreateAppResult = {
  app: Express;
  server: Server;
  corsOptions: CorsOptions;
  isOriginAllowed: (origin?: string | null) => boolean;
  allowedOrigins: string[];
};

export const createApp = (): CreateAppResult => {
  const app = express();
  app.set("trust proxy", 1);

  const { corsOptions, isOriginAllowed, allowedOrigins } = buildCorsState();

  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson?: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > LOG_LINE_LIMIT) {
          logLine = `${logLine.slice(0, LOG_LINE_LIMIT - 1)}…`;
        }

        log(logLine);
      }
    });

    next();
  });

  const server = setupRoutes(app);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = resolveErrorStatus(err);
    const message = describeError(err) || "Internal Server Error";
    res.status(status).json({ message });
    log(`❌ Error: ${message}`);
  });

  return {
    app,
    server,
    corsOptions,
    isOriginAllowed,
    allowedOrigins,
  };
};

export const __testables__ = {
  parseOrigins,
  parseOriginValue,
  buildCorsState,
  resolveErrorStatus,
};
