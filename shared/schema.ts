import { z, type RefinementCtx } from "zod";

const parseNumberInput = (
  value: string,
  ctx: RefinementCtx,
  message: string,
): number => {
  const trimmed = value.trim();
  if (trimmed === "") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    return z.NEVER;
  }

  const parsed = Number(trimmed);
  if (Number.isNaN(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    return z.NEVER;
  }

  return parsed;
};

const numberInput = (message = "Value must be a number") =>
  z.union([
    z.number({ invalid_type_error: message }),
    z.string().transform((value, ctx) => parseNumberInput(value, ctx, message)),
  ], { errorMap: () => ({ message }) });

const amountInput = (label: string) =>
  numberInput(`${label} must be a number`).pipe(
    z
      .number()
      .finite(`${label} must be a number`)
      .min(0, `${label} cannot be negative`),
  );

const optionalText = (max: number, label: string) =>
  z
    .string({ invalid_type_error: `${label} must be text` })
    .trim()
    .max(max, `${label} must be at most ${max} characters`)
    .nullish()
    .transform((value) => (value ? value : null));

export const PAYMENT_METHODS = ["cash", "card", "upi", "other"] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const billItemSchema = z.object({
  name: z
    .string({ required_error: "Item name is required" })
    .trim()
    .min(1, "Item name is required")
    .max(200, "Item name must be at most 200 characters"),
  mrp: amountInput("MRP")
    .nullish()
    .transform((value) => value ?? null),
  sell_price: amountInput("Selling price"),
  quantity: numberInput("Quantity must be a number")
    .pipe(
      z
        .number()
        .int("Quantity must be a whole number")
        .positive("Quantity must be at least 1"),
    )
    .default(1),
});

export type BillItem = z.infer<typeof billItemSchema>;

const roundCurrency = (value: number) => Math.round(value * 100) / 100;

export function computeBillTotal(
  items: Pick<BillItem, "sell_price" | "quantity">[],
  discount = 0,
): number {
  const subtotal = items.reduce(
    (sum, item) => sum + item.sell_price * item.quantity,
    0,
  );
  return Math.max(0, roundCurrency(subtotal - discount));
}

export const insertBillSchema = z
  .object({
    customer_name: optionalText(120, "Customer name"),
    customer_phone: optionalText(32, "Customer phone"),
    items: z
      .array(billItemSchema, { required_error: "Add at least one item to the bill" })
      .min(1, "Add at least one item to the bill"),
    discount: amountInput("Discount").default(0),
    total: amountInput("Total").optional(),
    payment_method: z
      .enum(PAYMENT_METHODS, {
        errorMap: () => ({
          message: `Payment method must be one of ${PAYMENT_METHODS.join(", ")}`,
        }),
      })
      .nullish()
      .transform((value) => value ?? null),
    notes: optionalText(1000, "Notes"),
  })
  .transform((bill) => ({
    ...bill,
    total: bill.total ?? computeBillTotal(bill.items, bill.discount),
  }));

export type InsertBill = z.infer<typeof insertBillSchema>;

export interface BillRecord extends InsertBill {
  id: string;
  created_at: string;
}

export const extractTagUrlSchema = z.object({
  url: z
    .string({ invalid_type_error: "Provide a valid image URL" })
    .trim()
    .url("Provide a valid image URL")
    .refine((value) => /^https?:\/\//i.test(value), "Image URL must use http or https"),
});
