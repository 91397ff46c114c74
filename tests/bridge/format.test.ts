import { describe, it } from "mocha";
import { expect } from "chai";

import { formatOutcome, formatPayload } from "../../src/bridge/format.js";
import { failure, success } from "../../src/bridge/outcome.js";

describe("bridge/format", () => {
  it("pretty-prints payloads with two-space indentation in insertion order", () => {
    expect(formatPayload({ success: true, nodeCount: 5 })).to.equal('{\n  "success": true,\n  "nodeCount": 5\n}');
  });

  it("renders scalars and arrays as JSON", () => {
    expect(formatPayload([1, "a"])).to.equal('[\n  1,\n  "a"\n]');
    expect(formatPayload("text")).to.equal('"text"');
    expect(formatPayload(null)).to.equal("null");
  });

  it("falls back to the string form for values JSON cannot express", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(formatPayload(undefined)).to.equal("undefined");
    expect(formatPayload(10n)).to.equal("10");
    expect(formatPayload(cyclic)).to.equal("[object Object]");
  });

  it("renders successes as the payload itself", () => {
    expect(formatOutcome(success({ success: true, id: "n1" }))).to.equal('{\n  "success": true,\n  "id": "n1"\n}');
  });

  it("forwards Gephi's own error body verbatim", () => {
    const payload = { success: false, error: "Node not found: ghost" };
    const outcome = failure("http_status_error", "Node not found: ghost", { status: 404, payload });

    expect(formatOutcome(outcome)).to.equal('{\n  "success": false,\n  "error": "Node not found: ghost"\n}');
  });

  it("synthesises an error document for transport failures", () => {
    const outcome = failure("connection_error", "Cannot connect to Gephi at http://127.0.0.1:8080.");

    expect(JSON.parse(formatOutcome(outcome))).to.deep.equal({
      success: false,
      error: "Cannot connect to Gephi at http://127.0.0.1:8080.",
      error_kind: "connection_error",
    });
  });

  it("includes the status when one was received", () => {
    const outcome = failure("http_status_error", "HTTP 502: Bad Gateway", { status: 502 });

    expect(formatOutcome(outcome)).to.equal(
      '{\n  "success": false,\n  "error": "HTTP 502: Bad Gateway",\n  "error_kind": "http_status_error",\n  "status": 502\n}',
    );
  });
});
