import type { ExtractionResult } from "@shared/priceTag";
import { log } from "./log";
import { describeError } from "./src/utils/inputs";

type CounterName = "ocr_failed" | "bill_save_failed" | "bill_list_failed";

type OcrSourceKind = "file" | "url";

type OcrFailureContext = {
  source: OcrSourceKind;
  status?: number | null;
  fileSize?: number | null;
  error: unknown;
};

type BillFailureStep = "save" | "list";

type BillFailureContext = {
  step: BillFailureStep;
  itemCount?: number | null;
  error: unknown;
};

const counters: Record<CounterName, number> = {
  ocr_failed: 0,
  bill_save_failed: 0,
  bill_list_failed: 0,
};

const stepToCounter: Record<BillFailureStep, CounterName> = {
  save: "bill_save_failed",
  list: "bill_list_failed",
};

export const incrementCounter = (name: CounterName) => {
  counters[name] += 1;
  log(`📈 metrics.${name}=${counters[name]}`, "metrics");
};

export const logOcrFailure = ({ source, status, fileSize, error }: OcrFailureContext) => {
  incrementCounter("ocr_failed");

  log(
    `extract-tag failure :: source=${source} status=${status ?? "n/a"} size=${
      fileSize ?? "n/a"
    } :: ${describeError(error)}`,
    "ocr",
  );
};

export const logBillFailure = ({ step, itemCount, error }: BillFailureContext) => {
  incrementCounter(stepToCounter[step]);

  log(`bill ${step} failure :: items=${itemCount ?? "n/a"} :: ${describeError(error)}`, "bills");
};

export const trackExtraction = (source: OcrSourceKind, result: ExtractionResult) => {
  const resolved = (["name", "mrp", "sell_price"] as const).filter(
    (field) => result[field] !== null,
  );

  log(
    `extract-tag :: source=${source} fields=${resolved.length > 0 ? resolved.join("|") : "none"}`,
    "ocr",
  );
};
