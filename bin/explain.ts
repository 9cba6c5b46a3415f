import { readFileSync } from "node:fs";
import { getTableColumns } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { configureLogging, logLevelFrom } from "../src/logging";
import {
  buildSearchFilter,
  createSearchTable,
  registrySchema,
  SearchCompiler,
  tokenize,
} from "../src/search";

// biome-ignore lint/complexity/useLiteralKeys: tsc complains about this (TS4111)
const FIELDS_FILE = process.env["FIELDS_FILE"];

// biome-ignore lint/complexity/useLiteralKeys: tsc complains about this (TS4111)
const TIME_ZONE = process.env["TIME_ZONE"] ?? "UTC";

// biome-ignore lint/complexity/useLiteralKeys: tsc complains about this (TS4111)
const STRICT_FIELDS = process.env["STRICT_FIELDS"] === "true";

// biome-ignore lint/complexity/useLiteralKeys: tsc complains about this (TS4111)
const LOG_LEVEL = process.env["LOG_LEVEL"];

const query = process.argv[2];
if (query == null) {
  console.error('Usage: explain "<search string>"');
  process.exit(1);
}

await configureLogging(logLevelFrom(LOG_LEVEL));

const fieldsSource =
  FIELDS_FILE == null ? new URL("./fields.json", import.meta.url) : FIELDS_FILE;
const fields = registrySchema.parse(
  JSON.parse(readFileSync(fieldsSource, "utf-8")),
);
const compiler = new SearchCompiler(fields, {
  timeZone: TIME_ZONE,
  strictFields: STRICT_FIELDS,
});

const result = compiler.safeCompile(query);
if (!result.success) {
  const { error } = result;
  console.error(`${error.name}: ${error.message}`);
  if (error.position != null) {
    console.error(`  ${query}`);
    console.error(`  ${" ".repeat(error.position)}^`);
  }
  process.exit(1);
}

console.log("-- TOKENS --");
for (const token of tokenize(query)) {
  const position = String(token.position).padStart(4);
  console.log(`${position}  ${token.type} ${token.value}`);
}

console.log("\n-- TREE --");
console.log(JSON.stringify(result.search.tree, null, 2));

console.log("\n-- METADATA --");
console.log(JSON.stringify(compiler.describe(result), null, 2));

console.log("\n-- QUERY --");
if (result.search.tree == null) {
  console.log("No query generated");
} else {
  const table = createSearchTable("records", compiler.registry);
  const filter = buildSearchFilter(result.search.tree, getTableColumns(table));
  const { sql, params } = new PgDialect().sqlToQuery(filter);
  console.log(`SELECT * FROM "records" WHERE ${sql}`);
  console.log(params);
}
