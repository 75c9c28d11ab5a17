import { describe, expect, test } from "vitest";

import { OrderIdGenerator } from "../../src/services/order-id";

describe("OrderIdGenerator", () => {
  test("should produce zero-padded 10 digit ids in sequence", () => {
    const ids = new OrderIdGenerator();

    expect(ids.next()).toBe("0000000001");
    expect(ids.next()).toBe("0000000002");
  });

  test("should wrap after the largest 10 digit id", () => {
    const ids = new OrderIdGenerator(9_999_999_999);

    expect(ids.next()).toBe("9999999999");
    expect(ids.next()).toBe("0000000001");
  });
});
