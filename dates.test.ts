import { describe, expect, it } from "vitest";
import { birthSortKey, parseDate, sortByBirth } from "./dates";
import type { Individual } from "./schema";

function person(id: string, name: string, birthDate?: string): Individual {
  return {
    id,
    name,
    givenName: "",
    surname: "",
    sex: "",
    birth: birthDate ? { date: birthDate } : {},
    death: {},
    fams: [],
  };
}

describe("parseDate", () => {
  it("reads a bare year as the first of January", () => {
    expect(parseDate("1930")).toEqual({ year: 1930, month: 1, day: 1 });
  });

  it("reads numeric dates as month/day/year first", () => {
    expect(parseDate("03/04/1930")).toEqual({ year: 1930, month: 3, day: 4 });
    expect(parseDate("3/4/1930")).toEqual({ year: 1930, month: 3, day: 4 });
  });

  it("falls back to day/month/year when the month is out of range", () => {
    expect(parseDate("25/12/1930")).toEqual({ year: 1930, month: 12, day: 25 });
  });

  it("expands two-digit years", () => {
    expect(parseDate("03/04/30")).toEqual({ year: 2030, month: 3, day: 4 });
    expect(parseDate("03/04/75")).toEqual({ year: 1975, month: 3, day: 4 });
  });

  it("reads month names in either position", () => {
    expect(parseDate("4 MAR 1930")).toEqual({ year: 1930, month: 3, day: 4 });
    expect(parseDate("4 march 1930")).toEqual({ year: 1930, month: 3, day: 4 });
    expect(parseDate("March 4, 1930")).toEqual({ year: 1930, month: 3, day: 4 });
    expect(parseDate("sep 9 1901")).toEqual({ year: 1901, month: 9, day: 9 });
  });

  it("rejects impossible calendar dates", () => {
    expect(parseDate("02/30/1930")).toBeUndefined();
    expect(parseDate("29 FEB 1900")).toBeUndefined();
    expect(parseDate("29 FEB 2000")).toEqual({ year: 2000, month: 2, day: 29 });
  });

  it("returns undefined for unsupported values", () => {
    expect(parseDate("garbage")).toBeUndefined();
    expect(parseDate("ABT 1930")).toBeUndefined();
    expect(parseDate("   ")).toBeUndefined();
    expect(parseDate(undefined)).toBeUndefined();
  });
});

describe("birthSortKey", () => {
  it("ranks parseable births ahead of the rest", () => {
    expect(birthSortKey(person("@I1@", "Arthur /Pryce/", "03/04/1930"))).toEqual([0, 1930, 3, 4, "arthur pryce"]);
    expect(birthSortKey(person("@I2@", "Thomas /Pryce/", "garbage"))).toEqual([1, "thomas pryce"]);
  });
});

describe("sortByBirth", () => {
  it("orders chronologically, then undated people by name", () => {
    const sorted = sortByBirth([
      person("@I1@", "Zed /Ash/", "garbage"),
      person("@I2@", "Bob /Ash/", "1950"),
      person("@I3@", "Al /Ash/"),
      person("@I4@", "Cy /Ash/", "12 MAY 1940"),
      person("@I5@", "Di /Ash/", "1940"),
    ]);

    expect(sorted.map((individual) => individual.id)).toEqual(["@I5@", "@I4@", "@I2@", "@I3@", "@I1@"]);
  });

  it("does not reorder its input", () => {
    const input = [person("@I1@", "B /X/", "1950"), person("@I2@", "A /X/", "1940")];
    sortByBirth(input);
    expect(input.map((individual) => individual.id)).toEqual(["@I1@", "@I2@"]);
  });
});
