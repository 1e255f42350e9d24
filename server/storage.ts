import { z } from "zod";
import {
  billItemSchema,
  PAYMENT_METHODS,
  type BillItem,
  type BillRecord,
  type InsertBill,
  type PaymentMethod,
} from "@shared/schema";
import { getDatabaseName, isDatabaseConfigured, query } from "./db";
import { clampInteger, describeError } from "./src/utils/inputs";

export const DEFAULT_BILL_LIST_LIMIT = 20;
export const MAX_BILL_LIST_LIMIT = 100;

type BillRow = {
  id: number | string;
  customer_name: string | null;
  customer_phone: string | null;
  items: unknown;
  discount: number | string | null;
  total: number | string;
  payment_method: string | null;
  notes: string | null;
  created_at: Date | string;
};

export type StorageHealth = {
  configured: boolean;
  connected: boolean;
  databaseName: string | null;
  tables: string[];
  error: string | null;
};

export interface IStorage {
  initializeBills(): Promise<void>;
  createBill(bill: InsertBill): Promise<BillRecord>;
  listBills(limit?: number): Promise<BillRecord[]>;
  checkHealth(): Promise<StorageHealth>;
}

const storedItemsSchema = z.array(billItemSchema);

const toNumber = (value: number | string | null | undefined): number => {
  if (value === null || value === undefined) {
    return 0;
  }

  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
};

const toIsoString = (value: Date | string): string =>
  value instanceof Date ? value.toISOString() : new Date(value).toISOString();

const isPaymentMethod = (value: string | null): value is PaymentMethod =>
  PAYMENT_METHODS.some((method) => method === value);

const mapItems = (value: unknown): BillItem[] => {
  const raw: unknown = typeof value === "string" ? JSON.parse(value) : value;
  const parsed = storedItemsSchema.safeParse(raw);
  return parsed.success ? parsed.data : [];
};

const mapBillRow = (row: BillRow): BillRecord => ({
  id: String(row.id),
  customer_name: row.customer_name,
  customer_phone: row.customer_phone,
  items: mapItems(row.items),
  discount: toNumber(row.discount),
  total: toNumber(row.total),
  payment_method: isPaymentMethod(row.payment_method) ? row.payment_method : null,
  notes: row.notes,
  created_at: toIsoString(row.created_at),
});

const BILL_COLUMNS = `
  id,
  customer_name,
  customer_phone,
  items,
  discount,
  total,
  payment_method,
  notes,
  created_at
`;

export class DatabaseStorage implements IStorage {
  private billStructuresReady: Promise<void> | null = null;

  private async ensureBillStructures(): Promise<void> {
    if (!this.billStructuresReady) {
      this.billStructuresReady = query(
        `
        CREATE TABLE IF NOT EXISTS bills (
          id SERIAL PRIMARY KEY,
          customer_name TEXT,
          customer_phone TEXT,
          items JSONB NOT NULL,
          discount NUMERIC(12, 2) NOT NULL DEFAULT 0,
          total NUMERIC(12, 2) NOT NULL,
          payment_method TEXT,
          notes TEXT,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `,
      ).then(
        () => undefined,
        (error: unknown) => {
          this.billStructuresReady = null;
          throw error;
        },
      );
    }

    await this.billStructuresReady;
  }

  async initializeBills(): Promise<void> {
    await this.ensureBillStructures();
  }

  async createBill(bill: InsertBill): Promise<BillRecord> {
    await this.ensureBillStructures();

    const { rows } = await query<BillRow>(
      `
      INSERT INTO bills (
        customer_name,
        customer_phone,
        items,
        discount,
        total,
        payment_method,
        notes
      )
      VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7)
      RETURNING ${BILL_COLUMNS}
      `,
      [
        bill.customer_name,
        bill.customer_phone,
        JSON.stringify(bill.items),
        bill.discount,
        bill.total,
        bill.payment_method,
        bill.notes,
      ],
    );

    const [row] = rows;
    if (!row) {
      throw new Error("Bill insert returned no rows");
    }

    return mapBillRow(row);
  }

  async listBills(limit: number = DEFAULT_BILL_LIST_LIMIT): Promise<BillRecord[]> {
    await this.ensureBillStructures();

    const { rows } = await query<BillRow>(
      `
      SELECT ${BILL_COLUMNS}
      FROM bills
      ORDER BY created_at DESC, id DESC
      LIMIT $1
      `,
      [clampInteger(limit, 1, MAX_BILL_LIST_LIMIT)],
    );

    return rows.map(mapBillRow);
  }

  async checkHealth(): Promise<StorageHealth> {
    const databaseName = getDatabaseName();
    if (!isDatabaseConfigured()) {
      return { configured: false, connected: false, databaseName, tables: [], error: null };
    }

    try {
      const { rows } = await query<{ table_name: string }>(
        `
        SELECT table_name
        FROM information_schema.tables
        WHERE table_schema = 'public'
        ORDER BY table_name
        LIMIT 10
        `,
      );

      return {
        configured: true,
        connected: true,
        databaseName,
        tables: rows.map((row) => row.table_name),
        error: null,
      };
    } catch (error: unknown) {
      return {
        configured: true,
        connected: false,
        databaseName,
        tables: [],
        error: describeError(error).slice(0, 50),
      };
    }
  }
}

export const storage: IStorage = new DatabaseStorage();
