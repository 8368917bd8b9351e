import { AccountNotFoundError } from "../errors";
import { IngestStores } from "../db/store";
import { IngestRequest, IngestResponse, JsonObject } from "../types/ingest";
import { ensureFields } from "./fieldAutoCreator";
import { routeLead } from "./routing";
import { resolvePayload, toLeadData } from "./schemaResolver";

export interface IngestOptions {
  excludedFields?: readonly string[];
}

/**
 * Run one webhook delivery through the pipeline.
 *
 * Flow: Account lookup → Schema snapshot → Resolve → Auto-create → Route → Persist → Respond
 *
 * Throws AccountNotFoundError for unknown or inactive keys; store failures
 * propagate as PersistenceError. Fields auto-created before a failed write
 * are kept. Routing failures leave the lead without a base.
 */
export async function ingestPayload(
  stores: IngestStores,
  request: IngestRequest,
  options: IngestOptions = {}
): Promise<IngestResponse> {
  const { payload, sourceIp } = request;

  const account = await stores.accounts.findActiveByApiKey(request.apiKey);
  if (!account) {
    throw new AccountNotFoundError();
  }

  console.log(`[ingest] Webhook received for account '${account.name}' (${account.id})`);

  // Snapshot may be stale against concurrent admin edits
  const snapshot = await stores.fields.listForAccount(account.id);
  const resolved = resolvePayload(account, snapshot, payload);

  for (const rejection of resolved.rejected) {
    console.warn(`[ingest] ${rejection.message}, treating as unknown`);
  }

  const known = new Map(resolved.known);
  let unknown = resolved.unknown;
  let fieldsCreated: string[] = [];

  if (account.auto_create_fields && unknown.length > 0) {
    // Only keys with no definition at all; rejected values keep their declared type
    const defined = new Set(snapshot.map((f) => f.field_name));
    const undefinedNames = unknown.filter((name) => !defined.has(name));

    if (undefinedNames.length > 0) {
      const ensured = await ensureFields(stores.fields, account, undefinedNames, payload, {
        excludedFields: options.excludedFields,
      });
      fieldsCreated = ensured.created;

      // New definitions apply to this payload too
      const retried = resolvePayload(account, ensured.definitions, pick(payload, undefinedNames));
      for (const [name, typed] of retried.known) {
        known.set(name, typed);
      }
      unknown = unknown.filter((name) => !retried.known.has(name));
    }
  }

  if (unknown.length > 0) {
    console.warn(`[ingest] Unknown fields for account ${account.id}:`, unknown);
  }

  let leadBaseId: string | null = null;
  try {
    leadBaseId = (await routeLead(stores.leadBases, account.id, payload)).id;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error(`[ingest] Routing failed for account ${account.id}:`, message);
  }

  const { record_id, lead_id, id_lead } = await stores.recordsAndLeads.createRecordAndLead(
    {
      account_id: account.id,
      payload,
      metadata: { source_ip: sourceIp, unknown_fields: unknown },
    },
    {
      account_id: account.id,
      lead_base_id: leadBaseId,
      data: toLeadData(known),
    }
  );

  console.log(
    `[ingest] Record ${record_id} and Lead ${lead_id} (#${id_lead}, base=${leadBaseId}) created for account ${account.id}`
  );

  return {
    success: true,
    record_id,
    lead_id,
    id_lead,
    lead_base_id: leadBaseId,
    unknown_fields: unknown,
    auto_create_enabled: account.auto_create_fields,
    fields_created: fieldsCreated,
  };
}

function pick(payload: JsonObject, names: readonly string[]): JsonObject {
  return Object.fromEntries(names.map((name) => [name, payload[name]] as const));
}
