import crypto from "node:crypto";

export const calculateChecksum = (content: string): string => {
  return crypto.createHash("sha256").update(content).digest("hex");
};

export const quoteIdentifier = (identifier: string): string =>
  `"${identifier.replace(/"/g, '""')}"`;

export const qualifyTableName = (tableName: string, schema?: string): string =>
  schema
    ? `${quoteIdentifier(schema)}.${quoteIdentifier(tableName)}`
    : quoteIdentifier(tableName);

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;
const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;

/**
 * Splits a script on top-level semicolons. Comments stay attached to the
 * statement that follows them; fragments made only of comments are dropped.
 */
export const splitStatements = (sql: string): string[] => {
  const statements: string[] = [];
  let current = "";
  let hasCode = false;
  let isSingleQuoted = false;
  let isEscapeString = false;
  let isDoubleQuoted = false;
  let isLineComment = false;
  let isBlockComment = false;

  const flush = (): void => {
    const trimmed = current.trim();

    if (hasCode && trimmed.length > 0) {
      statements.push(trimmed);
    }

    current = "";
    hasCode = false;
  };

  for (let index = 0; index < sql.length; index += 1) {
    const char = sql[index];
    const next = sql[index + 1];

    if (isLineComment) {
      current += char;

      if (char === "\n") {
        isLineComment = false;
      }

      continue;
    }

    if (isBlockComment) {
      current += char;

      if (char === "*" && next === "/") {
        current += next;
        index += 1;
        isBlockComment = false;
      }

      continue;
    }

    // Backslash escapes only exist in E'...' literals; '' works in both.
    if (isSingleQuoted) {
      current += char;

      if (char === "\\" && isEscapeString && next !== undefined) {
        current += next;
        index += 1;
      } else if (char === "'" && next === "'") {
        current += next;
        index += 1;
      } else if (char === "'") {
        isSingleQuoted = false;
      }

      continue;
    }

    if (isDoubleQuoted) {
      current += char;

      if (char === '"') {
        isDoubleQuoted = false;
      }

      continue;
    }

    if (char === "-" && next === "-") {
      current += char + next;
      index += 1;
      isLineComment = true;
      continue;
    }

    if (char === "/" && next === "*") {
      current += char + next;
      index += 1;
      isBlockComment = true;
      continue;
    }

    if (char === "$") {
      const tag = sql.slice(index).match(DOLLAR_TAG)?.[0];

      if (tag) {
        const close = sql.indexOf(tag, index + tag.length);
        const end = close === -1 ? sql.length : close + tag.length;

        current += sql.slice(index, end);
        hasCode = true;
        index = end - 1;
        continue;
      }
    }

    if (char === "'") {
      isSingleQuoted = true;
      isEscapeString =
        /^[Ee]$/.test(sql[index - 1] ?? "") &&
        !IDENTIFIER_CHAR.test(sql[index - 2] ?? "");
    } else if (char === '"') {
      isDoubleQuoted = true;
    }

    if (char === ";" && !isSingleQuoted && !isDoubleQuoted) {
      flush();
      continue;
    }

    if (char.trim().length > 0) {
      hasCode = true;
    }

    current += char;
  }

  flush();

  return statements;
};
