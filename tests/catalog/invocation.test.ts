import { before, describe, it } from "mocha";
import { expect } from "chai";

import { resolveInvocation } from "../../src/catalog/invocation.js";
import { findOperation, loadOperationCatalog, type OperationCatalog, type OperationDescriptor } from "../../src/catalog/schema.js";

describe("catalog/invocation", () => {
  let catalog: OperationCatalog;

  before(async () => {
    catalog = await loadOperationCatalog();
  });

  function operation(name: string): OperationDescriptor {
    const descriptor = findOperation(catalog, name);
    if (!descriptor) {
      throw new Error(`missing operation ${name}`);
    }
    return descriptor;
  }

  it("fills query defaults when params are omitted", () => {
    expect(resolveInvocation(operation("gephi_query_nodes"))).to.deep.equal({
      method: "GET",
      path: "/graph/nodes",
      query: { limit: 100, offset: 0 },
    });
    expect(resolveInvocation(operation("gephi_get_columns"), {})).to.deep.equal({
      method: "GET",
      path: "/graph/columns",
      query: { target: "node" },
    });
  });

  it("lets caller values win and drops keys outside the defaults", () => {
    const call = resolveInvocation(operation("gephi_query_edges"), { limit: 5, offset: null, extra: "ignored" });

    expect(call.query).to.deep.equal({ limit: 5, offset: 0 });
  });

  it("sends structured query values as JSON text", () => {
    const call = resolveInvocation(operation("gephi_get_layout_properties"), { algorithm: { name: "ForceAtlas2" } });

    expect(call.query).to.deep.equal({ algorithm: '{"name":"ForceAtlas2"}' });
  });

  it("targets workspace index 0 by default", () => {
    expect(resolveInvocation(operation("gephi_delete_workspace"))).to.deep.equal({
      method: "DELETE",
      path: "/workspace/delete",
      query: { index: 0 },
    });
    expect(resolveInvocation(operation("gephi_switch_workspace"))).to.deep.equal({
      method: "POST",
      path: "/workspace/switch",
      body: { index: 0 },
    });
    expect(resolveInvocation(operation("gephi_switch_workspace"), { index: 2 }).body).to.deep.equal({ index: 2 });
  });

  it("forwards body params untouched", () => {
    const params = { id: "n1", label: "Alice", attributes: { group: 3 } };

    expect(resolveInvocation(operation("gephi_add_node"), params)).to.deep.equal({
      method: "POST",
      path: "/graph/node/add",
      body: params,
    });
    expect(resolveInvocation(operation("gephi_run_layout")).body).to.deep.equal({});
  });

  it("encodes path parameters", () => {
    expect(resolveInvocation(operation("gephi_remove_node"), { id: "a b/c" })).to.deep.equal({
      method: "DELETE",
      path: "/graph/node/a%20b%2Fc",
    });
    expect(resolveInvocation(operation("gephi_remove_node")).path).to.equal("/graph/node/");
  });

  it("ignores params for parameterless operations", () => {
    expect(resolveInvocation(operation("gephi_compute_degree"), { unexpected: true })).to.deep.equal({
      method: "POST",
      path: "/statistics/degree",
    });
  });
});
