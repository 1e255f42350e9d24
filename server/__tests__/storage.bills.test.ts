import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";

type QueryFn = (text: string, params?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>;

describe("DatabaseStorage bills", () => {
  let queryMock: jest.Mock<QueryFn>;
  let databaseConfigured: boolean;
  let DatabaseStorage: typeof import("../storage").DatabaseStorage;

  beforeEach(async () => {
    jest.resetModules();
    queryMock = jest.fn<QueryFn>();
    databaseConfigured = true;
    jest.doMock("../db", () => ({
      query: queryMock,
      isDatabaseConfigured: () => databaseConfigured,
      getDatabaseName: () => (databaseConfigured ? "billing" : null),
    }));
    ({ DatabaseStorage } = await import("../storage"));
  });

  afterEach(() => {
    jest.resetModules();
    jest.clearAllMocks();
  });

  const createdAt = new Date("2024-05-01T10:30:00Z");

  const billRow = (overrides: Record<string, unknown> = {}) => ({
    id: 7,
    customer_name: "Asha",
    customer_phone: null,
    items: [
      { name: "Soap", mrp: 50, sell_price: 45.5, quantity: 2 },
      { name: "Oil", mrp: null, sell_price: 120, quantity: 1 },
    ],
    discount: "11.00",
    total: "200.00",
    payment_method: "cash",
    notes: null,
    created_at: createdAt,
    ...overrides,
  });

  const sqlCalls = (fragment: string) =>
    queryMock.mock.calls.filter(([sql]) => sql.includes(fragment));

  it("creates the bills table before inserting and maps the returned row", async () => {
    queryMock.mockResolvedValueOnce({ rows: [] });
    queryMock.mockResolvedValueOnce({ rows: [billRow()] });

    const storage = new DatabaseStorage();
    const items = [
      { name: "Soap", mrp: 50, sell_price: 45.5, quantity: 2 },
      { name: "Oil", mrp: null, sell_price: 120, quantity: 1 },
    ];

    const record = await storage.createBill({
      customer_name: "Asha",
      customer_phone: null,
      items,
      discount: 11,
      total: 200,
      payment_method: "cash",
      notes: null,
    });

    expect(queryMock).toHaveBeenCalledTimes(2);
    expect(queryMock.mock.calls[0][0]).toContain("CREATE TABLE IF NOT EXISTS bills");
    expect(queryMock.mock.calls[1][0]).toContain("INSERT INTO bills");
    expect(queryMock.mock.calls[1][1]).toEqual([
      "Asha",
      null,
      JSON.stringify(items),
      11,
      200,
      "cash",
      null,
    ]);

    expect(record).toEqual({
      id: "7",
      customer_name: "Asha",
      customer_phone: null,
      items,
      discount: 11,
      total: 200,
      payment_method: "cash",
      notes: null,
      created_at: "2024-05-01T10:30:00.000Z",
    });
  });

  it("only creates the table once per storage instance", async () => {
    queryMock.mockResolvedValue({ rows: [] });

    const storage = new DatabaseStorage();
    await storage.initializeBills();
    await storage.listBills();
    await storage.listBills();

    expect(sqlCalls("CREATE TABLE IF NOT EXISTS bills")).toHaveLength(1);
    expect(sqlCalls("FROM bills")).toHaveLength(2);
  });

  it("retries table creation after a failed attempt", async () => {
    queryMock.mockRejectedValueOnce(new Error("connection refused"));
    queryMock.mockResolvedValue({ rows: [] });

    const storage = new DatabaseStorage();
    await expect(storage.initializeBills()).rejects.toThrow("connection refused");
    await storage.initializeBills();

    expect(sqlCalls("CREATE TABLE IF NOT EXISTS bills")).toHaveLength(2);
  });

  it("lists the newest bills first with a clamped limit", async () => {
    queryMock.mockResolvedValue({ rows: [] });
    const storage = new DatabaseStorage();

    await storage.listBills();
    await storage.listBills(500);
    await storage.listBills(0);

    const listCalls = sqlCalls("FROM bills");
    expect(listCalls[0][0]).toContain("ORDER BY created_at DESC, id DESC");
    expect(listCalls.map(([, params]) => params)).toEqual([[20], [100], [1]]);
  });

  it("normalizes stored rows", async () => {
    queryMock.mockResolvedValueOnce({ rows: [] });
    queryMock.mockResolvedValueOnce({
      rows: [
        billRow({
          id: "12",
          items: JSON.stringify([{ name: "Tea", sell_price: 40 }]),
          discount: null,
          total: "40",
          payment_method: "cheque",
          created_at: "2024-05-02T08:00:00Z",
        }),
      ],
    });

    const storage = new DatabaseStorage();
    const [bill] = await storage.listBills();

    expect(bill).toEqual({
      id: "12",
      customer_name: "Asha",
      customer_phone: null,
      items: [{ name: "Tea", mrp: null, sell_price: 40, quantity: 1 }],
      discount: 0,
      total: 40,
      payment_method: null,
      notes: null,
      created_at: "2024-05-02T08:00:00.000Z",
    });
  });

  describe("checkHealth", () => {
    it("reports a missing database without querying", async () => {
      databaseConfigured = false;
      const storage = new DatabaseStorage();

      await expect(storage.checkHealth()).resolves.toEqual({
        configured: false,
        connected: false,
        databaseName: null,
        tables: [],
        error: null,
      });
      expect(queryMock).not.toHaveBeenCalled();
    });

    it("lists public tables when connected", async () => {
      queryMock.mockResolvedValueOnce({ rows: [{ table_name: "bills" }] });
      const storage = new DatabaseStorage();

      await expect(storage.checkHealth()).resolves.toEqual({
        configured: true,
        connected: true,
        databaseName: "billing",
        tables: ["bills"],
        error: null,
      });
    });

    it("captures a shortened error message instead of throwing", async () => {
      queryMock.mockRejectedValueOnce(
        new Error("password authentication failed for user \"billing_app\" on host db"),
      );
      const storage = new DatabaseStorage();

      const health = await storage.checkHealth();
      expect(health.connected).toBe(false);
      expect(health.error).toBe("password authentication failed for user \"billing_a");
    });
  });
});
