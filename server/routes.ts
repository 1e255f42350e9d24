import express, { type Express, type Request, type RequestHandler, type Response } from "express";
import { createServer, type Server } from "http";
import multer from "multer";
import path from "path";
import type { ZodIssue } from "zod";
import { parsePriceTag } from "@shared/priceTag";
import { extractTagUrlSchema, insertBillSchema } from "@shared/schema";
import { DatabaseNotConfiguredError } from "./db";
import { logBillFailure, logOcrFailure, trackExtraction } from "./observability";
import { ocrService, OcrServiceError, type OcrImageSource } from "./ocrSpaceService";
import { DEFAULT_BILL_LIST_LIMIT, storage } from "./storage";
import { describeError, isRecord, nullableNumberInput } from "./src/utils/inputs";

const DEFAULT_UPLOAD_MAX_BYTES = 5 * 1024 * 1024;
const DEFAULT_UPLOAD_FILENAME = "image.jpg";

export const MISSING_IMAGE_MESSAGE = "Provide an image file or a URL";

const resolveUploadLimit = (): number => {
  const configured = nullableNumberInput(process.env.UPLOAD_MAX_BYTES);
  return configured && configured > 0 ? configured : DEFAULT_UPLOAD_MAX_BYTES;
};

const uploadLimit = resolveUploadLimit();

const rawImageUpload = express.raw({
  type: ["image/*", "application/octet-stream"],
  limit: uploadLimit,
});

const multipartUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: uploadLimit, files: 1 },
});

// Multipart form with an optional `file` part and an optional `url` field.
const multipartImageUpload: RequestHandler = (req, res, next) => {
  multipartUpload.single("file")(req, res, (error?: unknown) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      res.status(status).json({ message: error.message });
      return;
    }

    next(error);
  });
};

type SourceResolution =
  | { ok: true; source: OcrImageSource }
  | { ok: false; message: string };

const resolveUploadFilename = (header: string | undefined): string => {
  if (!header) {
    return DEFAULT_UPLOAD_FILENAME;
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(header);
  } catch {
    decoded = header;
  }

  const basename = path.basename(decoded.replace(/\\/g, "/")).trim();
  return basename || DEFAULT_UPLOAD_FILENAME;
};

const hasUrlValue = (body: unknown): body is { url: unknown } =>
  isRecord(body) &&
  body.url !== undefined &&
  body.url !== null &&
  !(typeof body.url === "string" && body.url.trim() === "");

const resolveImageSource = (req: Request): SourceResolution => {
  const body: unknown = req.body;

  if (req.file) {
    if (req.file.size === 0) {
      return { ok: false, message: MISSING_IMAGE_MESSAGE };
    }

    return {
      ok: true,
      source: {
        kind: "file",
        data: req.file.buffer,
        filename: resolveUploadFilename(req.file.originalname),
        mimeType: req.file.mimetype,
      },
    };
  }

  if (Buffer.isBuffer(body)) {
    if (body.length === 0) {
      return { ok: false, message: MISSING_IMAGE_MESSAGE };
    }

    return {
      ok: true,
      source: {
        kind: "file",
        data: body,
        filename: resolveUploadFilename(req.header("x-filename")),
        mimeType: req.header("content-type"),
      },
    };
  }

  if (!hasUrlValue(body)) {
    return { ok: false, message: MISSING_IMAGE_MESSAGE };
  }

  const parsed = extractTagUrlSchema.safeParse({ url: body.url });
  if (!parsed.success) {
    return {
      ok: false,
      message: parsed.error.issues[0]?.message ?? "Provide a valid image URL",
    };
  }

  return { ok: true, source: { kind: "url", url: parsed.data.url } };
};

const formatIssues = (issues: ZodIssue[]) =>
  issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));

const respondWithStorageError = (res: Response, error: unknown, fallbackMessage: string) => {
  if (error instanceof DatabaseNotConfiguredError) {
    return res.status(503).json({ message: "Bill storage is not configured" });
  }

  return res.status(500).json({ message: fallbackMessage });
};

export function setupRoutes(app: Express): Server {
  app.get("/", (_req, res) => {
    res.json({ message: "Shop Billing OCR API" });
  });

  app.get("/api/hello", (_req, res) => {
    res.json({ message: "Hello from the backend API!" });
  });

  app.get("/test", async (_req, res) => {
    const health = await storage.checkHealth();

    const database = !health.configured
      ? "❌ Not Available"
      : health.connected
        ? "✅ Connected & Working"
        : `❌ Error: ${health.error ?? "unknown"}`;

    res.json({
      backend: "✅ Running",
      database,
      database_url: health.configured ? "✅ Set" : "❌ Not Set",
      database_name: health.databaseName,
      connection_status: health.connected ? "Connected" : "Not Connected",
      tables: health.tables,
    });
  });

  app.post("/api/extract-tag", rawImageUpload, multipartImageUpload, async (req, res) => {
    const resolution = resolveImageSource(req);
    if (!resolution.ok) {
      return res.status(400).json({ message: resolution.message });
    }

    const { source } = resolution;

    try {
      const text = await ocrService.extractText(source);
      const result = parsePriceTag(text);
      trackExtraction(source.kind, result);
      return res.json(result);
    } catch (error: unknown) {
      const status = error instanceof OcrServiceError ? error.status : 500;
      logOcrFailure({
        source: source.kind,
        status,
        fileSize: source.kind === "file" ? source.data.length : null,
        error,
      });

      const message =
        error instanceof OcrServiceError
          ? error.message
          : `Server error: ${describeError(error).slice(0, 120)}`;
      return res.status(status).json({ message });
    }
  });

  app.post("/api/bills", async (req, res) => {
    const parsed = insertBillSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = parsed.error.issues;
      return res.status(400).json({
        message: issues[0]?.message ?? "Bill details are invalid.",
        errors: formatIssues(issues),
      });
    }

    try {
      const bill = await storage.createBill(parsed.data);
      return res.status(201).json({ id: bill.id, status: "created" });
    } catch (error: unknown) {
      console.error("Error creating bill:", error);
      logBillFailure({ step: "save", itemCount: parsed.data.items.length, error });
      return respondWithStorageError(res, error, "Failed to save bill");
    }
  });

  app.get("/api/bills", async (req, res) => {
    const requestedLimit = nullableNumberInput(req.query.limit);
    const limit =
      requestedLimit !== null && requestedLimit > 0 ? requestedLimit : DEFAULT_BILL_LIST_LIMIT;

    try {
      const items = await storage.listBills(limit);
      return res.json({ items });
    } catch (error: unknown) {
      console.error("Error listing bills:", error);
      logBillFailure({ step: "list", error });
      return respondWithStorageError(res, error, "Failed to load bills");
    }
  });

  return createServer(app);
}
