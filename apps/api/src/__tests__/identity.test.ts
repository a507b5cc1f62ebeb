import { describe, expect, it } from "vitest";
import { InvalidIdentityError } from "../lib/errors.js";
import {
  assertOwnerId,
  assertProjectIdentity,
  isRfc1123Label,
  isValidProjectIdentity,
  isolationKeyFor,
  workloadNameFor,
} from "../lib/identity.js";
import { PROJECT_ID } from "./helpers.js";

describe("project identity", () => {
  it("accepts a lowercase canonical UUID", () => {
    expect(isValidProjectIdentity(PROJECT_ID)).toBe(true);
    expect(assertProjectIdentity("0f8fad5b-d9cb-469f-a165-70867728950e")).toBe("0f8fad5b-d9cb-469f-a165-70867728950e");
  });

  it.each([
    "",
    "not-a-uuid",
    "11111111-1111-1111-1111-11111111111",
    "11111111-1111-1111-1111-1111111111111",
    "11111111-1111-1111-1111-111111111111; rm -rf /",
    "$(whoami)-1111-1111-1111-111111111111",
    "11111111-1111-1111-1111-111111111111\n",
    "AAAAAAAA-1111-1111-1111-111111111111",
    "11111111111111111111111111111111",
  ])("rejects %j", (value) => {
    expect(isValidProjectIdentity(value)).toBe(false);
    expect(() => assertProjectIdentity(value)).toThrow(InvalidIdentityError);
  });

  it("rejects non-string values", () => {
    expect(isValidProjectIdentity(undefined)).toBe(false);
    expect(isValidProjectIdentity(42)).toBe(false);
  });

  it("derives the namespace and release name from the identity", () => {
    expect(isolationKeyFor(PROJECT_ID)).toBe(PROJECT_ID);
    expect(workloadNameFor(PROJECT_ID)).toBe("dev-session-11111111-1111-1111-1111-111111111111");
  });
});

describe("isRfc1123Label", () => {
  it("accepts DNS labels", () => {
    expect(isRfc1123Label("dev-session-template-lb")).toBe(true);
    expect(isRfc1123Label("a")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isRfc1123Label("-leading")).toBe(false);
    expect(isRfc1123Label("trailing-")).toBe(false);
    expect(isRfc1123Label("Upper")).toBe(false);
    expect(isRfc1123Label("a".repeat(64))).toBe(false);
    expect(isRfc1123Label("with space")).toBe(false);
  });
});

describe("assertOwnerId", () => {
  it("passes non-negative integers through", () => {
    expect(assertOwnerId(0, "owner user id")).toBe(0);
    expect(assertOwnerId(42, "owner user id")).toBe(42);
  });

  it("rejects negative, fractional and non-finite values", () => {
    expect(() => assertOwnerId(-1, "owner user id")).toThrow("Invalid owner user id: expected a non-negative integer");
    expect(() => assertOwnerId(1.5, "owner user id")).toThrow(InvalidIdentityError);
    expect(() => assertOwnerId(Number.NaN, "owner user id")).toThrow(InvalidIdentityError);
  });
});
