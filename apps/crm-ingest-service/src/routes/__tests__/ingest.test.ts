import request from "supertest";
import { createApp } from "../../app";
import { MemoryStore } from "../../db/memory";

describe("POST /ingest/:apiKey", () => {
  let store: MemoryStore;
  let accountId: string;

  beforeEach(() => {
    store = new MemoryStore();
    accountId = store.addAccount({ name: "Acme", api_key: "test-key", is_active: true, auto_create_fields: true }).id;
    store.addAccount({ name: "Old", api_key: "test-key-inactive", is_active: false, auto_create_fields: true });
  });

  it("should ingest a payload and summarize the result", async () => {
    const res = await request(createApp(store))
      .post("/ingest/test-key")
      .send({ email: "a@b.com", score: "7" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      record_id: expect.any(String),
      lead_id: expect.any(String),
      id_lead: 1,
      lead_base_id: store.listLeadBases(accountId)[0].id,
      unknown_fields: [],
      auto_create_enabled: true,
      fields_created: ["email", "score"],
    });
    expect(store.getLead(res.body.lead_id)?.data).toEqual({ email: "a@b.com", score: 7 });
  });

  it("should record the caller address", async () => {
    const res = await request(createApp(store)).post("/ingest/test-key").send({ source: "web" });

    expect(store.getRecord(res.body.record_id)?.metadata.source_ip).toMatch(/127\.0\.0\.1$|::1$/);
  });

  it("should answer 404 alike for unknown and inactive keys", async () => {
    const app = createApp(store);

    const missing = await request(app).post("/ingest/test-key-missing").send({ email: "a@b.com" });
    const inactive = await request(app).post("/ingest/test-key-inactive").send({ email: "a@b.com" });

    expect(missing.status).toBe(404);
    expect(inactive.status).toBe(404);
    expect(missing.body).toEqual({ error: "Account not found or inactive" });
    expect(inactive.body).toEqual(missing.body);
  });

  it("should reject bodies that are not JSON objects", async () => {
    const res = await request(createApp(store)).post("/ingest/test-key").send([{ email: "a@b.com" }]);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Payload must be a JSON object" });
  });

  it("should reject malformed JSON", async () => {
    const res = await request(createApp(store))
      .post("/ingest/test-key")
      .set("Content-Type", "application/json")
      .send('{"email": ');

    expect(res.status).toBe(400);
    expect(typeof res.body.error).toBe("string");
  });

  it("should read JSON bodies sent with another content type", async () => {
    const res = await request(createApp(store))
      .post("/ingest/test-key")
      .set("Content-Type", "text/plain")
      .send('{"email":"a@b.com"}');

    expect(res.status).toBe(200);
    expect(res.body.fields_created).toEqual(["email"]);
    expect(store.getRecord(res.body.record_id)?.payload).toEqual({ email: "a@b.com" });
    expect(store.getLead(res.body.lead_id)?.data).toEqual({ email: "a@b.com" });
  });

  it("should reject form-encoded bodies without storing anything", async () => {
    const res = await request(createApp(store))
      .post("/ingest/test-key")
      .type("form")
      .send("email=a@b.com");

    expect(res.status).toBe(400);
    expect(store.listRecords(accountId)).toEqual([]);
    expect(store.listLeads(accountId)).toEqual([]);
  });

  it("should answer 500 with a generic message when storage fails", async () => {
    store.failWrites(new Error("connection reset"));

    const res = await request(createApp(store)).post("/ingest/test-key").send({ source: "web" });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Failed to ingest payload" });
  });
});

describe("GET /health", () => {
  it("should report ok", async () => {
    const res = await request(createApp(new MemoryStore())).get("/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
  });
});
