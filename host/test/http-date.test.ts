import assert from "node:assert/strict";
import test from "node:test";

import { formatHttpDate, parseHttpDate, toHttpDatePrecision } from "../src/http-date";

test("http-date: formats IMF-fixdate in UTC", () => {
  const ms = Date.UTC(1994, 10, 6, 8, 49, 37);
  assert.equal(formatHttpDate(new Date(ms)), "Sun, 06 Nov 1994 08:49:37 GMT");
  assert.equal(formatHttpDate(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))), "Tue, 02 Jan 2024 03:04:05 GMT");
});

test("http-date: parses what it formats", () => {
  const ms = Date.UTC(2024, 0, 2, 3, 4, 5);
  assert.equal(parseHttpDate("Tue, 02 Jan 2024 03:04:05 GMT"), ms);
  assert.equal(parseHttpDate("  Tue, 02 Jan 2024 03:04:05 GMT  "), ms);
});

test("http-date: malformed dates parse to null", () => {
  assert.equal(parseHttpDate(""), null);
  assert.equal(parseHttpDate("yesterday"), null);
  assert.equal(parseHttpDate("Tuesday, 02-Jan-24 03:04:05 GMT"), null);
  assert.equal(parseHttpDate("Tue, 02 Jan 2024 03:04:05 UTC"), null);
  // out of range day
  assert.equal(parseHttpDate("Sat, 31 Feb 2024 03:04:05 GMT"), null);
  // wrong weekday
  assert.equal(parseHttpDate("Mon, 02 Jan 2024 03:04:05 GMT"), null);
  assert.equal(parseHttpDate("Tue, 02 Jan 2024 24:00:00 GMT"), null);
});

test("http-date: precision truncates to whole seconds", () => {
  assert.equal(toHttpDatePrecision(1_700_000_000_999), 1_700_000_000_000);
  assert.equal(toHttpDatePrecision(1_700_000_000_000), 1_700_000_000_000);
});
