import { randomUUID } from "crypto";
import { DefaultLeadBaseConflictError, FieldCreationConflictError, PersistenceError } from "../errors";
import {
  Account,
  AccountInsert,
  FieldDefinition,
  FieldDefinitionInsert,
  IngestRecord,
  Lead,
  LeadBase,
  LeadBaseInsert,
  LeadBaseWithRules,
  LeadInsert,
  RecordInsert,
  RecordLeadIds,
  RoutingRule,
  RoutingRuleInsert,
} from "../types/ingest";
import { IngestStores } from "./store";

export interface MemoryStoreOptions {
  /** Delay before each operation, so concurrent callers interleave */
  latencyMs?: number;
}

/**
 * In-memory store for development/testing.
 * Enforces the same unique keys as the Postgres schema, and writes each
 * record/lead pair (with its id_lead) in one synchronous step.
 */
export class MemoryStore implements IngestStores {
  private readonly accountsById = new Map<string, Account>();
  private readonly fieldsByKey = new Map<string, FieldDefinition>();
  private readonly records = new Map<string, IngestRecord>();
  private readonly leads = new Map<string, Lead>();
  private readonly leadBasesById = new Map<string, LeadBase>();
  private readonly rulesById = new Map<string, RoutingRule>();
  private readonly lastIdLead = new Map<string, number>();
  private writeFailure: Error | null = null;

  constructor(private readonly options: MemoryStoreOptions = {}) {}

  readonly accounts: IngestStores["accounts"] = {
    findByApiKey: async (apiKey) => {
      await this.pause();
      return this.findAccount(apiKey) ?? null;
    },
    findActiveByApiKey: async (apiKey) => {
      await this.pause();
      const account = this.findAccount(apiKey);
      return account?.is_active ? account : null;
    },
  };

  readonly fields: IngestStores["fields"] = {
    listForAccount: async (accountId) => {
      await this.pause();
      return Array.from(this.fieldsByKey.values()).filter((f) => f.account_id === accountId);
    },
    findByName: async (accountId, fieldName) => {
      await this.pause();
      return this.fieldsByKey.get(fieldKey(accountId, fieldName)) ?? null;
    },
    insert: async (field) => {
      await this.pause();
      return this.insertField(field);
    },
  };

  readonly leadBases: IngestStores["leadBases"] = {
    listWithRules: async (accountId) => {
      await this.pause();
      return this.listLeadBases(accountId);
    },
    findDefault: async (accountId) => {
      await this.pause();
      return this.findDefaultBase(accountId) ?? null;
    },
    insert: async (base) => {
      await this.pause();
      return this.insertLeadBase(base);
    },
  };

  readonly recordsAndLeads: IngestStores["recordsAndLeads"] = {
    createRecordAndLead: async (record, lead) => {
      await this.pause();
      return this.writeRecordAndLead(record, lead);
    },
  };

  // ==========================================================================
  // Admin-side helpers (seeding, inspection)
  // ==========================================================================

  addAccount(insert: AccountInsert): Account {
    const taken = Array.from(this.accountsById.values()).some((a) => a.api_key === insert.api_key);
    if (taken) {
      throw new PersistenceError(`api_key already in use: ${insert.api_key}`);
    }

    const now = new Date().toISOString();
    const account: Account = {
      id: insert.id ?? randomUUID(),
      name: insert.name,
      api_key: insert.api_key,
      is_active: insert.is_active,
      auto_create_fields: insert.auto_create_fields,
      created_at: now,
      updated_at: now,
    };
    this.accountsById.set(account.id, account);
    return account;
  }

  /** Soft delete: the account stays, ingest stops resolving it */
  deactivateAccount(accountId: string): void {
    const account = this.accountsById.get(accountId);
    if (account) {
      this.accountsById.set(accountId, {
        ...account,
        is_active: false,
        updated_at: new Date().toISOString(),
      });
    }
  }

  addField(field: FieldDefinitionInsert): FieldDefinition {
    return this.insertField(field);
  }

  /** Hard delete, as the admin surface does */
  deleteField(accountId: string, fieldName: string): boolean {
    return this.fieldsByKey.delete(fieldKey(accountId, fieldName));
  }

  listFields(accountId: string): FieldDefinition[] {
    return Array.from(this.fieldsByKey.values()).filter((f) => f.account_id === accountId);
  }

  addLeadBase(base: LeadBaseInsert): LeadBase {
    return this.insertLeadBase(base);
  }

  addRoutingRule(rule: RoutingRuleInsert): RoutingRule {
    if (!this.leadBasesById.has(rule.lead_base_id)) {
      throw new PersistenceError(`Lead base not found: ${rule.lead_base_id}`);
    }

    const created: RoutingRule = {
      id: randomUUID(),
      lead_base_id: rule.lead_base_id,
      field: rule.field,
      operator: rule.operator,
      value: rule.value,
      priority: rule.priority ?? 0,
      created_at: new Date().toISOString(),
    };
    this.rulesById.set(created.id, created);
    return created;
  }

  /** Rules go with it; leads keep their rows with lead_base_id cleared */
  deleteLeadBase(leadBaseId: string): boolean {
    for (const [id, rule] of this.rulesById) {
      if (rule.lead_base_id === leadBaseId) this.rulesById.delete(id);
    }
    for (const [id, lead] of this.leads) {
      if (lead.lead_base_id === leadBaseId) this.leads.set(id, { ...lead, lead_base_id: null });
    }
    return this.leadBasesById.delete(leadBaseId);
  }

  listLeadBases(accountId: string): LeadBaseWithRules[] {
    const rules = Array.from(this.rulesById.values());
    return Array.from(this.leadBasesById.values())
      .filter((b) => b.account_id === accountId)
      .map((b) => ({ ...b, routing_rules: rules.filter((r) => r.lead_base_id === b.id) }));
  }

  getRecord(recordId: string): IngestRecord | null {
    return this.records.get(recordId) ?? null;
  }

  getLead(leadId: string): Lead | null {
    return this.leads.get(leadId) ?? null;
  }

  listRecords(accountId: string): IngestRecord[] {
    return Array.from(this.records.values()).filter((r) => r.account_id === accountId);
  }

  listLeads(accountId: string): Lead[] {
    return Array.from(this.leads.values()).filter((l) => l.account_id === accountId);
  }

  /** Make every following record/lead write reject with this error (null to clear) */
  failWrites(error: Error | null): void {
    this.writeFailure = error;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private findAccount(apiKey: string): Account | undefined {
    return Array.from(this.accountsById.values()).find((a) => a.api_key === apiKey);
  }

  private insertField(field: FieldDefinitionInsert): FieldDefinition {
    const key = fieldKey(field.account_id, field.field_name);
    if (this.fieldsByKey.has(key)) {
      throw new FieldCreationConflictError(field.account_id, field.field_name);
    }

    const created: FieldDefinition = {
      id: randomUUID(),
      account_id: field.account_id,
      field_name: field.field_name,
      data_type: field.data_type,
      description: field.description ?? null,
      is_required: field.is_required ?? false,
      created_at: new Date().toISOString(),
    };
    this.fieldsByKey.set(key, created);
    return created;
  }

  private findDefaultBase(accountId: string): LeadBase | undefined {
    return Array.from(this.leadBasesById.values()).find((b) => b.account_id === accountId && b.is_default);
  }

  private insertLeadBase(base: LeadBaseInsert): LeadBase {
    if (base.is_default && this.findDefaultBase(base.account_id)) {
      throw new DefaultLeadBaseConflictError(base.account_id);
    }

    const created: LeadBase = {
      id: randomUUID(),
      account_id: base.account_id,
      name: base.name,
      is_default: base.is_default,
      created_at: new Date().toISOString(),
    };
    this.leadBasesById.set(created.id, created);
    return created;
  }

  private writeRecordAndLead(record: RecordInsert, lead: LeadInsert): RecordLeadIds {
    if (this.writeFailure) {
      throw new PersistenceError(`Failed to write record and lead: ${this.writeFailure.message}`, this.writeFailure);
    }
    if (record.account_id !== lead.account_id) {
      throw new PersistenceError("Record and lead must belong to the same account");
    }
    if (lead.lead_base_id !== null && this.leadBasesById.get(lead.lead_base_id)?.account_id !== lead.account_id) {
      throw new PersistenceError(`Lead base not found: ${lead.lead_base_id}`);
    }

    const idLead = (this.lastIdLead.get(lead.account_id) ?? 0) + 1;
    this.lastIdLead.set(lead.account_id, idLead);

    const createdAt = new Date().toISOString();
    const recordId = randomUUID();
    const leadId = randomUUID();

    this.records.set(recordId, {
      id: recordId,
      account_id: record.account_id,
      payload: structuredClone(record.payload),
      metadata: { ...record.metadata, unknown_fields: [...record.metadata.unknown_fields] },
      created_at: createdAt,
    });
    this.leads.set(leadId, {
      id: leadId,
      account_id: lead.account_id,
      record_id: recordId,
      id_lead: idLead,
      lead_base_id: lead.lead_base_id,
      data: { ...lead.data },
      created_at: createdAt,
    });

    return { record_id: recordId, lead_id: leadId, id_lead: idLead };
  }

  private async pause(): Promise<void> {
    const ms = this.options.latencyMs ?? 0;
    await new Promise<void>((resolve) => setTimeout(resolve, ms));
  }
}

function fieldKey(accountId: string, fieldName: string): string {
  return `${accountId}:${fieldName}`;
}
