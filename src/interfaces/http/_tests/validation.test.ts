import { describe, expect, it } from "vitest";

import { FakeReply } from "../../../_tests/fakes";
import { requestSignal } from "../validation";

describe("requestSignal", () => {
  it("aborts when the client disconnects before the reply is sent", () => {
    const res = new FakeReply();
    const signal = requestSignal(res);

    res.close();

    expect(signal.aborted).toBe(true);
  });

  it("stays live when the connection closes after the reply", () => {
    const res = new FakeReply();
    const signal = requestSignal(res);

    res.json({ ok: true });
    res.close();

    expect(signal.aborted).toBe(false);
  });
});
