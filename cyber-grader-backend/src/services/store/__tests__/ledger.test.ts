import { AttemptLedger } from "../ledger";

interface Attempt {
  user_id: string;
  item: string;
  value: number;
}

describe("AttemptLedger", () => {
  let ledger: AttemptLedger<Attempt>;

  beforeEach(() => {
    ledger = new AttemptLedger<Attempt>((attempt) => [attempt.user_id, attempt.item]);
  });

  it("keeps attempts in insertion order per key", () => {
    ledger.append({ user_id: "u1", item: "a", value: 1 });
    ledger.append({ user_id: "u2", item: "a", value: 2 });
    ledger.append({ user_id: "u1", item: "a", value: 3 });

    expect(ledger.forKey("u1", "a").map((a) => a.value)).toEqual([1, 3]);
    expect(ledger.all().map((a) => a.value)).toEqual([1, 2, 3]);
    expect(ledger.size).toBe(3);
  });

  it("returns an empty list for a key with no attempts", () => {
    expect(ledger.forKey("u1", "missing")).toEqual([]);
  });

  it("does not confuse keys whose joined parts look alike", () => {
    ledger.append({ user_id: "u1:a", item: "b", value: 1 });
    expect(ledger.forKey("u1", "a:b")).toEqual([]);
  });

  it("filters by user", () => {
    ledger.append({ user_id: "u1", item: "a", value: 1 });
    ledger.append({ user_id: "u2", item: "b", value: 2 });
    ledger.append({ user_id: "u1", item: "c", value: 3 });

    expect(ledger.forUser("u1").map((a) => a.item)).toEqual(["a", "c"]);
  });

  it("stores frozen copies", () => {
    const input = { user_id: "u1", item: "a", value: 1 };
    const stored = ledger.append(input);
    input.value = 99;

    expect(Object.isFrozen(stored)).toBe(true);
    expect(ledger.all()[0].value).toBe(1);
  });

  it("hands out copies of its lists", () => {
    ledger.append({ user_id: "u1", item: "a", value: 1 });
    ledger.all().pop();
    ledger.forKey("u1", "a").pop();

    expect(ledger.size).toBe(1);
    expect(ledger.forKey("u1", "a")).toHaveLength(1);
  });
});
