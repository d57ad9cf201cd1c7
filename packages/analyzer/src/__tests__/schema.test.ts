import { describe, it, expect } from "vitest";
import { parsePrismaSchema, PrismaSyntaxError } from "../schema/prisma.js";
import { parseSqlMigration } from "../schema/sql.js";
import { diffTables, toSchemaDelta } from "../schema/differ.js";
import { migrationLayout, migrationFor, namesTable } from "../schema/migrations.js";
import type { MigrationRef } from "../types.js";

const SCHEMA = `
datasource db {
  provider = "postgresql"
  url      = env("DATABASE_URL")
}

// Acquisition packages
model Package {
  id        String   @id @default(cuid())
  title     String
  ownerId   String   @map("owner_id")
  owner     User     @relation(fields: [ownerId], references: [id])
  notes     String?
  tags      String[]
  updatedAt DateTime @updatedAt

  @@map("packages")
}

model User {
  id       String    @id
  packages Package[]
}
`;

// ---------------------------------------------------------------------------
// Prisma
// ---------------------------------------------------------------------------

describe("parsePrismaSchema", () => {
  it("reads models, mapped names, defaults and relations", () => {
    expect(parsePrismaSchema(SCHEMA)).toEqual([
      {
        name: "packages",
        columns: [
          { name: "id", type: "String", nullable: false, hasDefault: true },
          { name: "title", type: "String", nullable: false, hasDefault: false },
          { name: "owner_id", type: "String", nullable: false, hasDefault: false },
          { name: "notes", type: "String?", nullable: true, hasDefault: false },
          { name: "tags", type: "String[]", nullable: false, hasDefault: false },
          { name: "updatedAt", type: "DateTime", nullable: false, hasDefault: true },
        ],
        relations: [{ columns: ["owner_id"], referencedTable: "User", referencedColumns: ["id"] }],
      },
      {
        name: "User",
        columns: [{ name: "id", type: "String", nullable: false, hasDefault: false }],
        relations: [],
      },
    ]);
  });

  it("rejects an unterminated model", () => {
    expect(() => parsePrismaSchema("model Package {\n  id String @id\n")).toThrow(PrismaSyntaxError);
  });

  it("rejects stray text between blocks", () => {
    expect(() => parsePrismaSchema("model A {\n}\nhello\n")).toThrow("line 3: unexpected `hello`");
  });
});

// ---------------------------------------------------------------------------
// SQL
// ---------------------------------------------------------------------------

describe("parseSqlMigration", () => {
  const sql = `
-- CreateTable
CREATE TABLE "approvals" (
  "id" TEXT NOT NULL,
  "package_id" TEXT NOT NULL,
  "approved_at" TIMESTAMP(3),
  CONSTRAINT "approvals_pkey" PRIMARY KEY ("id")
);

-- AddForeignKey
ALTER TABLE "approvals" ADD CONSTRAINT "approvals_package_id_fkey" FOREIGN KEY ("package_id") REFERENCES "packages"("id") ON DELETE RESTRICT ON UPDATE CASCADE;

ALTER TABLE "packages" ADD COLUMN "status" TEXT NOT NULL, DROP COLUMN "legacy_code", ALTER COLUMN "budget" SET DATA TYPE DECIMAL(12,2);

DROP TABLE "drafts";
`;

  it("reads created, altered and dropped tables in order", () => {
    expect(parseSqlMigration(sql)).toEqual([
      {
        table: "approvals",
        changeType: "New",
        columns: [
          { name: "id", changeType: "Added", typeAfter: "TEXT" },
          { name: "package_id", changeType: "Added", typeAfter: "TEXT" },
          { name: "approved_at", changeType: "Added", typeAfter: "TIMESTAMP(3)" },
        ],
        relations: [
          { columns: ["package_id"], referencedTable: "packages", referencedColumns: ["id"] },
        ],
        impacts: [],
      },
      {
        table: "packages",
        changeType: "Modified",
        columns: [
          { name: "status", changeType: "Added", typeAfter: "TEXT" },
          { name: "legacy_code", changeType: "Removed" },
          { name: "budget", changeType: "Modified", typeAfter: "DECIMAL(12,2)" },
        ],
        relations: [],
        impacts: [
          "Backfill required: `status` is NOT NULL without a default",
          "Data loss: column `legacy_code` is dropped",
          "Type conversion: `budget` changes to DECIMAL(12,2)",
        ],
      },
      {
        table: "drafts",
        changeType: "Deleted",
        columns: [],
        relations: [],
        impacts: ["Data loss: table `drafts` is dropped"],
      },
    ]);
  });

  it("does not ask for a backfill when the new column has a default", () => {
    const [change] = parseSqlMigration(
      "ALTER TABLE packages ADD COLUMN priority INTEGER NOT NULL DEFAULT 0;",
    );
    expect(change?.impacts).toEqual([]);
  });

  it("flags tightened nullability", () => {
    const [change] = parseSqlMigration('ALTER TABLE "packages" ALTER COLUMN "title" SET NOT NULL;');
    expect(change?.impacts).toEqual(["Existing NULLs: `title` becomes NOT NULL"]);
  });
});

// ---------------------------------------------------------------------------
// Schema diffs and migrations
// ---------------------------------------------------------------------------

describe("diffTables", () => {
  const before = parsePrismaSchema(SCHEMA);

  it("adds a nullable column with no data impact", () => {
    const after = parsePrismaSchema(
      SCHEMA.replace(
        "  notes     String?\n",
        '  notes     String?\n  fitaraApprovalId String? @map("fitara_approval_id")\n',
      ),
    );
    const migration: MigrationRef = {
      name: "20240501_add_fitara",
      file: "prisma/migrations/20240501_add_fitara/migration.sql",
      sql: 'ALTER TABLE "packages" ADD COLUMN "fitara_approval_id" TEXT;',
      hasDown: true,
    };
    const [change] = diffTables(before, after);
    expect(change && toSchemaDelta(change, migrationFor("packages", [migration]))).toEqual({
      table: "packages",
      changeType: "Modified",
      columns: [{ name: "fitara_approval_id", changeType: "Added", typeAfter: "String?" }],
      relations: [],
      migrationName: "20240501_add_fitara",
      reversible: true,
      dataImpact: "None",
    });
  });

  it("summarizes every impact of a destructive change", () => {
    const after = parsePrismaSchema(
      SCHEMA.replace("  notes     String?\n", "  notes     String\n")
        .replace("  title     String\n", "  title     Int\n")
        .replace("  tags      String[]\n", "  fiscalYear Int\n"),
    );
    const [change] = diffTables(before, after);
    expect(change && toSchemaDelta(change, undefined)).toEqual({
      table: "packages",
      changeType: "Modified",
      columns: [
        { name: "title", changeType: "Modified", typeBefore: "String", typeAfter: "Int" },
        { name: "notes", changeType: "Modified", typeBefore: "String?", typeAfter: "String" },
        { name: "tags", changeType: "Removed", typeBefore: "String[]" },
        { name: "fiscalYear", changeType: "Added", typeAfter: "Int" },
      ],
      relations: [],
      reversible: "unknown",
      dataImpact: [
        "Type conversion: `title` changes from String to Int",
        "Existing NULLs: `notes` becomes NOT NULL",
        "Data loss: column `tags` is dropped",
        "Backfill required: `fiscalYear` is NOT NULL without a default",
      ].join("; "),
    });
  });

  it("reports new and dropped tables", () => {
    const changes = diffTables(before.slice(1), before.slice(0, 1));
    expect(changes.map((c) => [c.table, c.changeType, c.impacts])).toEqual([
      ["packages", "New", []],
      ["User", "Deleted", ["Data loss: table `User` is dropped"]],
    ]);
  });
});

describe("migrations", () => {
  it.each([
    ["prisma/migrations/20240501_add_fitara/migration.sql", "20240501_add_fitara", "prisma/migrations/20240501_add_fitara/down.sql"],
    ["db/migrations/0007_approvals.sql", "0007_approvals", "db/migrations/0007_approvals.down.sql"],
    ["db/migrations/0007_approvals.up.sql", "0007_approvals", "db/migrations/0007_approvals.down.sql"],
  ])("%s is migration %s", (path, name, downPath) => {
    expect(migrationLayout(path)).toEqual({ name, downPath });
  });

  it("does not treat down scripts or other files as migrations", () => {
    expect(migrationLayout("db/migrations/0007_approvals.down.sql")).toBeUndefined();
    expect(migrationLayout("prisma/migrations/migration_lock.toml")).toBeUndefined();
    expect(migrationLayout("db/seed.sql")).toBeUndefined();
  });

  it("matches table names as whole identifiers", () => {
    expect(namesTable('ALTER TABLE "packages" ADD COLUMN x TEXT', "packages")).toBe(true);
    expect(namesTable("CREATE TABLE packages_audit (id TEXT)", "packages")).toBe(false);
  });

  it("picks the first migration that names the table", () => {
    const refs: MigrationRef[] = [
      { name: "a", file: "m/a.sql", sql: "CREATE TABLE users (id TEXT)", hasDown: false },
      { name: "b", file: "m/b.sql", sql: "ALTER TABLE packages ADD x TEXT", hasDown: false },
      { name: "c", file: "m/c.sql", sql: "ALTER TABLE packages ADD y TEXT", hasDown: true },
    ];
    expect(migrationFor("packages", refs)?.name).toBe("b");
    expect(migrationFor("approvals", refs)).toBeUndefined();
  });
});
