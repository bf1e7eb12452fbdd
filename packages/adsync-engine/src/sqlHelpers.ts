import { TargetTable } from "./model/tables";

/**
 * Quote a ClickHouse identifier with backticks if not already quoted.
 * Backticks allow special characters (e.g., hyphens) in identifiers.
 */
export const quoteIdentifier = (name: string): string => {
  return name.startsWith("`") && name.endsWith("`") ? name : `\`${name}\``;
};

/**
 * Values supported by SQL engine.
 */
export type Value = string | number | boolean | Date;

/**
 * Supported value or SQL instance.
 */
export type RawValue = Value | Sql;

/** Anything a template slot accepts. Tables render as quoted names. */
export type SqlArgument = RawValue | TargetTable;

const isTargetTable = (value: SqlArgument): value is TargetTable =>
  typeof value === "object" &&
  !(value instanceof Date) &&
  !(value instanceof Sql) &&
  "keyColumn" in value;

/**
 * Sql template tag interface with attached helper methods.
 */
export interface SqlTemplateTag {
  (strings: readonly string[], ...values: readonly SqlArgument[]): Sql;

  /**
   * Create raw SQL from a string without parameterization.
   * WARNING: SQL injection risk if used with untrusted input.
   */
  raw(text: string): Sql;
}

/**
 * A SQL instance can be nested within each other to build SQL strings.
 */
export class Sql {
  readonly values: Value[] = [];
  readonly strings: string[];

  constructor(
    rawStrings: readonly string[],
    rawValues: readonly SqlArgument[],
  ) {
    if (rawStrings.length === 0) {
      throw new TypeError("Expected at least 1 string");
    }
    if (rawStrings.length - 1 !== rawValues.length) {
      throw new TypeError(
        `Expected ${rawStrings.length} strings to have ${
          rawStrings.length - 1
        } values`,
      );
    }

    this.strings = [rawStrings[0]];
    const appendText = (text: string): void => {
      this.strings[this.strings.length - 1] += text;
    };

    rawValues.forEach((child, index) => {
      const rawString = rawStrings[index + 1];
      if (child instanceof Sql) {
        appendText(child.strings[0]);
        child.values.forEach((value, childIndex) => {
          this.values.push(value);
          this.strings.push(child.strings[childIndex + 1]);
        });
        appendText(rawString);
      } else if (isTargetTable(child)) {
        appendText(quoteIdentifier(child.name) + rawString);
      } else {
        this.values.push(child);
        this.strings.push(rawString);
      }
    });
  }
}

function sqlImpl(
  strings: readonly string[],
  ...values: readonly SqlArgument[]
): Sql {
  return new Sql(strings, values);
}

export const sql: SqlTemplateTag = Object.assign(sqlImpl, {
  raw: (text: string): Sql => new Sql([text], []),
});

/**
 * Convert the JS type to the ClickHouse type of its named placeholder.
 * Integers bind as Int64 so row ids of any size fit.
 */
export const mapToClickHouseType = (value: Value): string => {
  if (typeof value === "number") {
    return Number.isInteger(value) ? "Int64" : "Float64";
  }
  if (typeof value === "boolean") return "Bool";
  if (value instanceof Date) return "DateTime64(3)";
  return "String";
};

export const getValueFromParameter = (value: Value): string | number | boolean =>
  value instanceof Date ? value.getTime() / 1000 : value;

/**
 * ClickHouse uses `{name:Type}` placeholders; names get a `p` prefix since a
 * bare number is not a valid parameter name.
 */
export function createClickhouseParameter(
  parameterIndex: number,
  value: Value,
): string {
  return `{p${parameterIndex}:${mapToClickHouseType(value)}}`;
}

export const toQuery = (
  query: Sql,
): [string, Record<string, string | number | boolean>] => {
  let text = query.strings[0];
  const params: Record<string, string | number | boolean> = {};
  query.values.forEach((value, i) => {
    text += createClickhouseParameter(i, value) + query.strings[i + 1];
    params[`p${i}`] = getValueFromParameter(value);
  });
  return [text, params];
};
