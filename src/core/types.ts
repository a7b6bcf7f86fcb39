/**
 * Shared types for the Jama MCP server.
 *
 * Records coming back from Jama are passed through to MCP clients untouched,
 * so they are typed as plain JSON objects rather than modelled field by field.
 */

// ==================== RECORDS ====================

export type JamaRecord = Record<string, unknown>;

/**
 * Parent of a new or moved item: either another item or the project root.
 */
export interface ItemLocation {
  item?: number;
  project?: number;
}

export interface ItemInput {
  project: number;
  itemTypeId: number;
  childItemTypeId: number;
  location: ItemLocation;
  fields: Record<string, unknown>;
}

export interface ItemUpdateInput extends ItemInput {
  itemId: number;
}

export interface ProjectInput {
  name: string;
  projectKey: string;
  itemTypeId: number;
}

export interface RelationshipInput {
  fromItem: number;
  toItem: number;
  relationshipType?: number;
}

// ==================== CLIENT ====================

/**
 * Operations every tool handler may call on the shared client handle.
 *
 * Single-record reads resolve to `null` when the record does not exist; list
 * reads resolve to an empty array.
 */
export interface JamaClient {
  getProjects(): Promise<JamaRecord[]>;
  getItem(itemId: string): Promise<JamaRecord | null>;
  getItems(projectId: string): Promise<JamaRecord[]>;
  getItemChildren(itemId: string): Promise<JamaRecord[]>;
  getRelationships(projectId: string): Promise<JamaRecord[]>;
  getRelationship(relationshipId: string): Promise<JamaRecord | null>;
  getItemsUpstreamRelationships(itemId: string): Promise<JamaRecord[]>;
  getItemsDownstreamRelationships(itemId: string): Promise<JamaRecord[]>;
  getItemsUpstreamRelated(itemId: string): Promise<JamaRecord[]>;
  getItemsDownstreamRelated(itemId: string): Promise<JamaRecord[]>;
  getItemTypes(): Promise<JamaRecord[]>;
  getItemType(itemTypeId: string): Promise<JamaRecord | null>;
  getPickLists(): Promise<JamaRecord[]>;
  getPickList(pickListId: string): Promise<JamaRecord | null>;
  getPickListOptions(pickListId: string): Promise<JamaRecord[]>;
  getPickListOption(pickListOptionId: string): Promise<JamaRecord | null>;
  getTags(projectId: string): Promise<JamaRecord[]>;
  getTaggedItems(tagId: string): Promise<JamaRecord[]>;
  getTestCycle(testCycleId: string): Promise<JamaRecord | null>;
  getTestRuns(testCycleId: string): Promise<JamaRecord[]>;
  getAvailableEndpoints(): Promise<JamaRecord>;

  /** @returns ID of the created item */
  postItem(input: ItemInput): Promise<number>;
  /** @returns ID of the created tag */
  postTag(name: string, project: number): Promise<number>;
  /** @returns HTTP status of the request (201 on success) */
  postItemTag(itemId: number, tagId: number): Promise<number>;
  /** @returns HTTP status of the request */
  putItem(input: ItemUpdateInput): Promise<number>;
  /** @returns ID of the created project */
  postProject(input: ProjectInput): Promise<number>;
  /** @returns ID of the created relationship */
  postRelationship(input: RelationshipInput): Promise<number>;
}

// ==================== CREDENTIALS & LIFECYCLE ====================

export interface CredentialPair {
  readonly clientId: string;
  readonly clientSecret: string;
}

export type ResolutionMode = 'mock' | 'direct' | 'secrets-manager';

export interface CredentialResolution {
  readonly mode: Exclude<ResolutionMode, 'mock'>;
  readonly credentials: CredentialPair;
}

/**
 * Reads a named secret, decrypting it when the backend supports it.
 * Throws on any network, permission or not-found condition.
 */
export type SecretFetcher = (path: string, profile?: string) => Promise<string>;

export const JAMA_CLIENT = 'jama_client';

/**
 * Per-process context shared by every tool handler.
 */
export type LifespanContext = Readonly<{ [JAMA_CLIENT]: JamaClient }>;
