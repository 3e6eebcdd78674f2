import { describe, expect, it } from "vitest";
import { mongoClientOptions } from "./mongo";

describe("mongoClientOptions", () => {
  it("bounds socket operations by the audit write timeout", () => {
    expect(mongoClientOptions(5000)).toEqual({
      serverSelectionTimeoutMS: 10_000,
      connectTimeoutMS: 10_000,
      socketTimeoutMS: 5000,
    });
  });

  it("leaves the driver default when no bound is given", () => {
    expect(mongoClientOptions().socketTimeoutMS).toBeUndefined();
  });
});
