import {
  Account,
  FieldDefinition,
  FieldDefinitionInsert,
  LeadBase,
  LeadBaseInsert,
  LeadBaseWithRules,
  LeadInsert,
  RecordInsert,
  RecordLeadIds,
} from "../types/ingest";

/**
 * Storage seams used by the ingest pipeline.
 * Implemented by the Supabase modules and by the in-memory store.
 */

export interface AccountStore {
  findByApiKey(apiKey: string): Promise<Account | null>;
  /** Inactive accounts resolve to null, same as missing ones */
  findActiveByApiKey(apiKey: string): Promise<Account | null>;
}

export interface FieldStore {
  listForAccount(accountId: string): Promise<FieldDefinition[]>;
  findByName(accountId: string, fieldName: string): Promise<FieldDefinition | null>;
  /**
   * Insert one definition.
   * Rejects with FieldCreationConflictError when (account_id, field_name) exists.
   */
  insert(field: FieldDefinitionInsert): Promise<FieldDefinition>;
}

export interface LeadBaseStore {
  /** Bases in creation order, each with its routing rules */
  listWithRules(accountId: string): Promise<LeadBaseWithRules[]>;
  findDefault(accountId: string): Promise<LeadBase | null>;
  /**
   * Insert one base.
   * Rejects with DefaultLeadBaseConflictError when it is a second default.
   */
  insert(base: LeadBaseInsert): Promise<LeadBase>;
}

export interface RecordLeadStore {
  /** Both rows are written or neither is; id_lead is assigned in the same step */
  createRecordAndLead(record: RecordInsert, lead: LeadInsert): Promise<RecordLeadIds>;
}

export interface IngestStores {
  accounts: AccountStore;
  fields: FieldStore;
  leadBases: LeadBaseStore;
  recordsAndLeads: RecordLeadStore;
}
