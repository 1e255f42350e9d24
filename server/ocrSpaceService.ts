/**
 * OCR Service
 * Turns a price-tag photo (uploaded bytes or a public URL) into plain text
 * using the OCR.space parse API.
 */

import { z } from "zod";
import { describeError } from "./src/utils/inputs";

export const DEFAULT_OCR_SPACE_URL = "https://api.ocr.space/parse/image";
// Public demo key published by OCR.space.
export const DEFAULT_OCR_SPACE_APIKEY = "helloworld";
export const DEFAULT_OCR_TIMEOUT_MS = 30_000;

const DETAIL_LIMIT = 120;

export type OcrImageSource =
  | { kind: "file"; data: Buffer; filename: string; mimeType?: string }
  | { kind: "url"; url: string };

export interface OcrProvider {
  extractText(source: OcrImageSource): Promise<string>;
}

export class OcrServiceError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "OcrServiceError";
  }
}

const ocrSpaceResponseSchema = z.object({
  IsErroredOnProcessing: z.boolean().optional(),
  ErrorMessage: z.union([z.string(), z.array(z.string()), z.null()]).optional(),
  ParsedResults: z
    .array(
      z.object({
        ParsedText: z.string().nullish(),
      }),
    )
    .nullish(),
});

type OcrSpaceResponse = z.infer<typeof ocrSpaceResponseSchema>;

type OcrSpaceServiceOptions = {
  apiKey?: string;
  endpoint?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const parseTimeout = (value: string | undefined): number => {
  const parsed = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_OCR_TIMEOUT_MS;
};

const serverError = (error: unknown) =>
  new OcrServiceError(`Server error: ${describeError(error).slice(0, DETAIL_LIMIT)}`, 500, {
    cause: error,
  });

const describeProcessingError = (payload: OcrSpaceResponse): string => {
  const { ErrorMessage } = payload;
  if (Array.isArray(ErrorMessage)) {
    const joined = ErrorMessage.filter(Boolean).join("; ");
    return joined || "Unable to read text";
  }

  return ErrorMessage || "Unable to read text";
};

export class OcrSpaceService implements OcrProvider {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OcrSpaceServiceOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.OCR_SPACE_APIKEY ?? DEFAULT_OCR_SPACE_APIKEY;
    this.endpoint = options.endpoint ?? process.env.OCR_SPACE_URL ?? DEFAULT_OCR_SPACE_URL;
    this.timeoutMs = options.timeoutMs ?? parseTimeout(process.env.OCR_TIMEOUT_MS);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async extractText(source: OcrImageSource): Promise<string> {
    const response = await this.send(this.buildForm(source));

    if (response.status !== 200) {
      const body = await this.readBody(response);
      throw new OcrServiceError(`OCR service error: ${body.slice(0, DETAIL_LIMIT)}`, 502);
    }

    const payload = await this.readPayload(response);
    const results = payload.ParsedResults ?? [];
    if (payload.IsErroredOnProcessing || results.length === 0) {
      throw new OcrServiceError(describeProcessingError(payload), 400);
    }

    return results.map((result) => result.ParsedText ?? "").join("\n");
  }

  private buildForm(source: OcrImageSource): FormData {
    const form = new FormData();
    form.append("language", "eng");
    form.append("OCREngine", "2");
    form.append("isOverlayRequired", "false");

    if (source.kind === "file") {
      const blob = new Blob([new Uint8Array(source.data)], {
        type: source.mimeType ?? "application/octet-stream",
      });
      form.append("file", blob, source.filename);
    } else {
      form.append("url", source.url);
    }

    return form;
  }

  private async send(form: FormData): Promise<Response> {
    try {
      return await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: { apikey: this.apiKey },
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw serverError(error);
    }
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error: unknown) {
      throw serverError(error);
    }
  }

  private async readPayload(response: Response): Promise<OcrSpaceResponse> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw serverError(error);
    }

    const parsed = ocrSpaceResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw serverError("Unexpected response from OCR service");
    }

    return parsed.data;
  }
}

export const ocrService: OcrProvider = new OcrSpaceService();
