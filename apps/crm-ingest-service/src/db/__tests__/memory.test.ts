import { MemoryStore } from "../memory";
import { DefaultLeadBaseConflictError, FieldCreationConflictError, PersistenceError } from "../../errors";

describe("MemoryStore", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it("should refuse a second account with the same api key", () => {
    store.addAccount({ name: "A", api_key: "test-key", is_active: true, auto_create_fields: true });

    expect(() =>
      store.addAccount({ name: "B", api_key: "test-key", is_active: true, auto_create_fields: false })
    ).toThrow(PersistenceError);
  });

  it("should hide inactive accounts from active lookups only", async () => {
    const account = store.addAccount({ name: "A", api_key: "test-key", is_active: false, auto_create_fields: true });

    await expect(store.accounts.findActiveByApiKey("test-key")).resolves.toBeNull();
    await expect(store.accounts.findByApiKey("test-key")).resolves.toEqual(account);
  });

  it("should enforce unique field names per account", async () => {
    const a = store.addAccount({ name: "A", api_key: "test-key-a", is_active: true, auto_create_fields: true });
    const b = store.addAccount({ name: "B", api_key: "test-key-b", is_active: true, auto_create_fields: true });

    await store.fields.insert({ account_id: a.id, field_name: "email", data_type: "email" });
    await store.fields.insert({ account_id: b.id, field_name: "email", data_type: "string" });

    await expect(
      store.fields.insert({ account_id: a.id, field_name: "email", data_type: "string" })
    ).rejects.toBeInstanceOf(FieldCreationConflictError);
    await expect(store.fields.findByName(a.id, "email")).resolves.toMatchObject({ data_type: "email" });
    await expect(store.fields.listForAccount(b.id)).resolves.toHaveLength(1);
  });

  it("should link the lead to its record", async () => {
    const account = store.addAccount({ name: "A", api_key: "test-key", is_active: true, auto_create_fields: true });

    const ids = await store.recordsAndLeads.createRecordAndLead(
      { account_id: account.id, payload: { x: 1 }, metadata: { source_ip: null, unknown_fields: ["x"] } },
      { account_id: account.id, lead_base_id: null, data: {} }
    );

    expect(store.getLead(ids.lead_id)?.record_id).toBe(ids.record_id);
    expect(store.getRecord(ids.record_id)?.metadata.unknown_fields).toEqual(["x"]);
  });

  it("should write neither row when the pair is rejected", async () => {
    const account = store.addAccount({ name: "A", api_key: "test-key", is_active: true, auto_create_fields: true });

    await expect(
      store.recordsAndLeads.createRecordAndLead(
        { account_id: account.id, payload: {}, metadata: { source_ip: null, unknown_fields: [] } },
        { account_id: "someone-else", lead_base_id: null, data: {} }
      )
    ).rejects.toBeInstanceOf(PersistenceError);

    expect(store.listRecords(account.id)).toEqual([]);
    expect(store.listLeads(account.id)).toEqual([]);
  });

  it("should number leads per account inside the pair write", async () => {
    const a = store.addAccount({ name: "A", api_key: "test-key-a", is_active: true, auto_create_fields: true });
    const b = store.addAccount({ name: "B", api_key: "test-key-b", is_active: true, auto_create_fields: true });
    const write = (accountId: string) =>
      store.recordsAndLeads.createRecordAndLead(
        { account_id: accountId, payload: {}, metadata: { source_ip: null, unknown_fields: [] } },
        { account_id: accountId, lead_base_id: null, data: {} }
      );

    const ids = [await write(a.id), await write(a.id), await write(b.id)];

    expect(ids.map((i) => i.id_lead)).toEqual([1, 2, 1]);
  });

  it("should not use up a lead number when the pair is rejected", async () => {
    const account = store.addAccount({ name: "A", api_key: "test-key", is_active: true, auto_create_fields: true });
    const record = { account_id: account.id, payload: {}, metadata: { source_ip: null, unknown_fields: [] } };

    await expect(
      store.recordsAndLeads.createRecordAndLead(record, { account_id: account.id, lead_base_id: "missing", data: {} })
    ).rejects.toBeInstanceOf(PersistenceError);
    const ids = await store.recordsAndLeads.createRecordAndLead(record, {
      account_id: account.id,
      lead_base_id: null,
      data: {},
    });

    expect(ids.id_lead).toBe(1);
    expect(store.listRecords(account.id)).toHaveLength(1);
  });

  it("should allow one default lead base per account", async () => {
    const a = store.addAccount({ name: "A", api_key: "test-key-a", is_active: true, auto_create_fields: true });
    const b = store.addAccount({ name: "B", api_key: "test-key-b", is_active: true, auto_create_fields: true });

    const first = await store.leadBases.insert({ account_id: a.id, name: "Default", is_default: true });
    await store.leadBases.insert({ account_id: a.id, name: "Spain", is_default: false });
    await store.leadBases.insert({ account_id: b.id, name: "Default", is_default: true });

    await expect(
      store.leadBases.insert({ account_id: a.id, name: "Other", is_default: true })
    ).rejects.toBeInstanceOf(DefaultLeadBaseConflictError);
    await expect(store.leadBases.findDefault(a.id)).resolves.toEqual(first);
  });

  it("should list bases with their own rules", async () => {
    const account = store.addAccount({ name: "A", api_key: "test-key", is_active: true, auto_create_fields: true });
    const spain = store.addLeadBase({ account_id: account.id, name: "Spain", is_default: false });
    const big = store.addLeadBase({ account_id: account.id, name: "Big", is_default: false });
    const rule = store.addRoutingRule({ lead_base_id: spain.id, field: "country", operator: "equals", value: "ES" });

    const bases = await store.leadBases.listWithRules(account.id);

    expect(bases.map((b) => [b.name, b.routing_rules])).toEqual([
      ["Spain", [rule]],
      ["Big", []],
    ]);
    expect(rule.priority).toBe(0);
    expect(() =>
      store.addRoutingRule({ lead_base_id: "missing", field: "x", operator: "equals", value: "1" })
    ).toThrow(PersistenceError);
    expect(big.is_default).toBe(false);
  });

  it("should detach leads from a deleted lead base", async () => {
    const account = store.addAccount({ name: "A", api_key: "test-key", is_active: true, auto_create_fields: true });
    const spain = store.addLeadBase({ account_id: account.id, name: "Spain", is_default: false });
    store.addRoutingRule({ lead_base_id: spain.id, field: "country", operator: "equals", value: "ES" });
    const ids = await store.recordsAndLeads.createRecordAndLead(
      { account_id: account.id, payload: {}, metadata: { source_ip: null, unknown_fields: [] } },
      { account_id: account.id, lead_base_id: spain.id, data: {} }
    );

    expect(store.deleteLeadBase(spain.id)).toBe(true);

    expect(store.getLead(ids.lead_id)?.lead_base_id).toBeNull();
    expect(store.listLeadBases(account.id)).toEqual([]);
  });
});
