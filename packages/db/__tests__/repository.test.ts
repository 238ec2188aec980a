/**
 * Link Repository Tests
 *
 * Unit tests for the PostgreSQL link repository against a mocked pool.
 * Verifies SQL parameters, row mapping, and unique-violation handling.
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import {
  PgLinkRepository,
  DuplicateLinkError,
  isUniqueViolation,
  mapLinkRow,
  checkDbConnection,
  ensureSchema,
  SCHEMA_SQL,
  type LinkRow,
  type SqlClient,
} from "../src/index.js";

type QueryFn = (text: string, values?: unknown[]) => Promise<{ rows: LinkRow[]; rowCount: number | null }>;

function createMockClient() {
  const query = jest.fn<QueryFn>();
  const end = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const client: SqlClient = {
    query: <T>(text: string, values?: unknown[]) =>
      query(text, values) as unknown as Promise<{ rows: T[]; rowCount: number | null }>,
    end,
  };
  return { client, query, end };
}

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

const row: LinkRow = {
  id: "abc123",
  target_url: "https://example.com",
  expires_at: new Date("2030-01-01T00:00:00.000Z"),
  created_at: new Date("2029-12-31T00:00:00.000Z"),
  updated_at: new Date("2029-12-31T00:00:00.000Z"),
};

describe("PgLinkRepository", () => {
  let mock: ReturnType<typeof createMockClient>;
  let repository: PgLinkRepository;

  beforeEach(() => {
    mock = createMockClient();
    repository = new PgLinkRepository(mock.client);
  });

  describe("exists", () => {
    it("should return true when a row is found", async () => {
      mock.query.mockResolvedValue({ rows: [row], rowCount: 1 });
      await expect(repository.exists("abc123")).resolves.toBe(true);
      expect(mock.query).toHaveBeenCalledWith("SELECT 1 FROM links WHERE id = $1 LIMIT 1", ["abc123"]);
    });

    it("should return false when no row is found", async () => {
      mock.query.mockResolvedValue({ rows: [], rowCount: 0 });
      await expect(repository.exists("nope12")).resolves.toBe(false);
    });
  });

  describe("findById", () => {
    it("should map the row to a record", async () => {
      mock.query.mockResolvedValue({ rows: [row], rowCount: 1 });
      await expect(repository.findById("abc123")).resolves.toEqual({
        id: "abc123",
        targetUrl: "https://example.com",
        expiresAt: new Date("2030-01-01T00:00:00.000Z"),
        createdAt: new Date("2029-12-31T00:00:00.000Z"),
        updatedAt: new Date("2029-12-31T00:00:00.000Z"),
      });
    });

    it("should return null when missing", async () => {
      mock.query.mockResolvedValue({ rows: [], rowCount: 0 });
      await expect(repository.findById("abc123")).resolves.toBeNull();
    });
  });

  describe("save", () => {
    it("should insert and return the stored record", async () => {
      mock.query.mockResolvedValue({ rows: [{ ...row, expires_at: null }], rowCount: 1 });

      const saved = await repository.save({
        id: "abc123",
        targetUrl: "https://example.com",
        expiresAt: null,
      });

      expect(saved.expiresAt).toBeNull();
      expect(saved.createdAt).toEqual(row.created_at);
      const [sql, values] = mock.query.mock.calls[0];
      expect(sql).toContain("INSERT INTO links (id, target_url, expires_at)");
      expect(values).toEqual(["abc123", "https://example.com", null]);
    });

    it("should raise DuplicateLinkError on unique violation", async () => {
      mock.query.mockRejectedValue(pgError("23505", "duplicate key value violates unique constraint"));

      const save = repository.save({ id: "abc123", targetUrl: "https://example.com", expiresAt: null });

      await expect(save).rejects.toBeInstanceOf(DuplicateLinkError);
      await expect(save).rejects.toMatchObject({ id: "abc123" });
    });

    it("should propagate other errors unchanged", async () => {
      const err = pgError("57014", "canceling statement due to statement timeout");
      mock.query.mockRejectedValue(err);

      await expect(
        repository.save({ id: "abc123", targetUrl: "https://example.com", expiresAt: null })
      ).rejects.toBe(err);
    });
  });

  describe("delete", () => {
    it("should delete by ID", async () => {
      mock.query.mockResolvedValue({ rows: [], rowCount: 1 });
      await repository.deleteById("abc123");
      expect(mock.query).toHaveBeenCalledWith("DELETE FROM links WHERE id = $1", ["abc123"]);
    });

    it("should delete a record by its ID", async () => {
      mock.query.mockResolvedValue({ rows: [], rowCount: 1 });
      await repository.delete(mapLinkRow(row));
      expect(mock.query).toHaveBeenCalledWith("DELETE FROM links WHERE id = $1", ["abc123"]);
    });
  });

  describe("findAllWithExpiryBefore", () => {
    it("should query non-null expiries up to the timestamp", async () => {
      const cutoff = new Date("2030-06-01T00:00:00.000Z");
      mock.query.mockResolvedValue({ rows: [row], rowCount: 1 });

      const records = await repository.findAllWithExpiryBefore(cutoff);

      expect(records.map((r) => r.id)).toEqual(["abc123"]);
      const [sql, values] = mock.query.mock.calls[0];
      expect(sql).toContain("expires_at IS NOT NULL");
      expect(sql).toContain("expires_at <= $1");
      expect(values).toEqual([cutoff]);
    });
  });

  describe("ping", () => {
    it("should report connectivity", async () => {
      mock.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
      await expect(repository.ping()).resolves.toBe(true);

      mock.query.mockRejectedValueOnce(new Error("ECONNREFUSED"));
      await expect(repository.ping()).resolves.toBe(false);
    });
  });
});

describe("isUniqueViolation", () => {
  it("should match SQLSTATE 23505 only", () => {
    expect(isUniqueViolation(pgError("23505", "dup"))).toBe(true);
    expect(isUniqueViolation(pgError("23503", "fk"))).toBe(false);
    expect(isUniqueViolation(new Error("plain"))).toBe(false);
    expect(isUniqueViolation("23505")).toBe(false);
  });
});

describe("Pool helpers", () => {
  it("should apply the schema", async () => {
    const mock = createMockClient();
    mock.query.mockResolvedValue({ rows: [], rowCount: null });

    await ensureSchema(mock.client);

    expect(mock.query).toHaveBeenCalledWith(SCHEMA_SQL, undefined);
    expect(SCHEMA_SQL).toContain("id          VARCHAR(64)  PRIMARY KEY");
  });

  it("should report health from a trivial query", async () => {
    const mock = createMockClient();
    mock.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    await expect(checkDbConnection(mock.client)).resolves.toBe(true);

    mock.query.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    await expect(checkDbConnection(mock.client)).resolves.toBe(false);
  });
});
