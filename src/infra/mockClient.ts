import type { Logger } from 'pino';
import type {
  ItemInput,
  ItemUpdateInput,
  JamaClient,
  JamaRecord,
  ProjectInput,
  RelationshipInput
} from '../core/types.js';

// Canned data served in mock mode. Lookups match on the literal string ID;
// any other ID yields null (single record) or [] (list).

const PROJECTS: JamaRecord[] = [
  { id: 1, name: 'Mock Project Alpha', projectKey: 'MPA' },
  { id: 2, name: 'Mock Project Beta', projectKey: 'MPB' }
];

const ITEMS: Record<string, JamaRecord> = {
  '123': { id: 123, documentKey: 'MOCK-1', fields: { name: 'Mock Item 123', description: 'A sample item.' } },
  '456': { id: 456, documentKey: 'MOCK-2', fields: { name: 'Another Mock Item', description: 'Details here.' } }
};

const PROJECT_ITEMS: Record<string, string[]> = { '1': ['123'], '2': ['456'] };

const CHILDREN: Record<string, JamaRecord[]> = {
  '123': [
    { id: 789, documentKey: 'MOCK-3', fields: { name: 'Child Item 1', description: 'Child of 123' } },
    { id: 790, documentKey: 'MOCK-4', fields: { name: 'Child Item 2', description: 'Another child of 123' } }
  ]
};

const RELATIONSHIP_101: JamaRecord = { id: 101, fromItem: 123, toItem: 789, relationshipType: 1 };
const RELATIONSHIP_102: JamaRecord = { id: 102, fromItem: 790, toItem: 123, relationshipType: 2 };

const REQUIREMENT_TYPE: JamaRecord = { id: 10, name: 'Requirement', typeKey: 'REQ' };
const ITEM_TYPES: JamaRecord[] = [REQUIREMENT_TYPE, { id: 11, name: 'Test Case', typeKey: 'TC' }];

const PRIORITY_PICK_LIST: JamaRecord = { id: 20, name: 'Priority' };
const PICK_LISTS: JamaRecord[] = [PRIORITY_PICK_LIST, { id: 21, name: 'Status' }];

const HIGH_OPTION: JamaRecord = { id: 201, name: 'High' };
const PICK_LIST_OPTIONS: JamaRecord[] = [HIGH_OPTION, { id: 202, name: 'Medium' }, { id: 203, name: 'Low' }];

const TAGS: JamaRecord[] = [
  { id: 301, name: 'UI' },
  { id: 302, name: 'Backend' }
];

const TEST_CYCLE_501: JamaRecord = { id: 501, name: 'Cycle 1', startDate: '2025-01-01', endDate: '2025-01-31' };

const TEST_RUNS_501: JamaRecord[] = [
  { id: 601, name: 'Run 1', status: 'PASSED' },
  { id: 602, name: 'Run 2', status: 'FAILED' }
];

export const MOCK_CREATED_IDS = {
  item: 123,
  tag: 303,
  project: 3,
  relationship: 103
} as const;

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Stand-in for the Jama REST client used when `JAMA_MOCK_MODE=true`.
 *
 * Every call returns a fresh copy of fixed data, so repeated calls with the
 * same arguments return equal results and callers cannot corrupt the fixtures.
 * Mutations return fixed IDs and record nothing.
 */
export class MockJamaClient implements JamaClient {
  constructor(private readonly log: Logger) {}

  private lookup(itemId: string): JamaRecord | null {
    const item = ITEMS[itemId];
    return item ? clone(item) : null;
  }

  private lookupAll(itemIds: string[]): JamaRecord[] {
    return itemIds.flatMap((id) => {
      const item = this.lookup(id);
      return item ? [item] : [];
    });
  }

  async getProjects(): Promise<JamaRecord[]> {
    this.log.debug('MOCK: getProjects()');
    return clone(PROJECTS);
  }

  async getItem(itemId: string): Promise<JamaRecord | null> {
    this.log.debug({ itemId }, 'MOCK: getItem()');
    const item = this.lookup(itemId);
    if (!item) this.log.warn({ itemId }, 'MOCK: item not found');
    return item;
  }

  async getItems(projectId: string): Promise<JamaRecord[]> {
    this.log.debug({ projectId }, 'MOCK: getItems()');
    return this.lookupAll(PROJECT_ITEMS[projectId] ?? []);
  }

  async getItemChildren(itemId: string): Promise<JamaRecord[]> {
    this.log.debug({ itemId }, 'MOCK: getItemChildren()');
    return clone(CHILDREN[itemId] ?? []);
  }

  async getRelationships(projectId: string): Promise<JamaRecord[]> {
    this.log.debug({ projectId }, 'MOCK: getRelationships()');
    return projectId === '1' ? clone([RELATIONSHIP_101, RELATIONSHIP_102]) : [];
  }

  async getRelationship(relationshipId: string): Promise<JamaRecord | null> {
    this.log.debug({ relationshipId }, 'MOCK: getRelationship()');
    return relationshipId === '101' ? clone(RELATIONSHIP_101) : null;
  }

  async getItemsUpstreamRelationships(itemId: string): Promise<JamaRecord[]> {
    this.log.debug({ itemId }, 'MOCK: getItemsUpstreamRelationships()');
    return itemId === '789' ? clone([RELATIONSHIP_101]) : [];
  }

  async getItemsDownstreamRelationships(itemId: string): Promise<JamaRecord[]> {
    this.log.debug({ itemId }, 'MOCK: getItemsDownstreamRelationships()');
    return itemId === '123' ? clone([RELATIONSHIP_101]) : [];
  }

  async getItemsUpstreamRelated(itemId: string): Promise<JamaRecord[]> {
    this.log.debug({ itemId }, 'MOCK: getItemsUpstreamRelated()');
    return itemId === '789' ? this.lookupAll(['123']) : [];
  }

  async getItemsDownstreamRelated(itemId: string): Promise<JamaRecord[]> {
    this.log.debug({ itemId }, 'MOCK: getItemsDownstreamRelated()');
    return itemId === '123' ? this.lookupAll(['789']) : [];
  }

  async getItemTypes(): Promise<JamaRecord[]> {
    this.log.debug('MOCK: getItemTypes()');
    return clone(ITEM_TYPES);
  }

  async getItemType(itemTypeId: string): Promise<JamaRecord | null> {
    this.log.debug({ itemTypeId }, 'MOCK: getItemType()');
    return itemTypeId === '10' ? clone(REQUIREMENT_TYPE) : null;
  }

  async getPickLists(): Promise<JamaRecord[]> {
    this.log.debug('MOCK: getPickLists()');
    return clone(PICK_LISTS);
  }

  async getPickList(pickListId: string): Promise<JamaRecord | null> {
    this.log.debug({ pickListId }, 'MOCK: getPickList()');
    return pickListId === '20' ? clone(PRIORITY_PICK_LIST) : null;
  }

  async getPickListOptions(pickListId: string): Promise<JamaRecord[]> {
    this.log.debug({ pickListId }, 'MOCK: getPickListOptions()');
    return pickListId === '20' ? clone(PICK_LIST_OPTIONS) : [];
  }

  async getPickListOption(pickListOptionId: string): Promise<JamaRecord | null> {
    this.log.debug({ pickListOptionId }, 'MOCK: getPickListOption()');
    return pickListOptionId === '201' ? clone(HIGH_OPTION) : null;
  }

  async getTags(projectId: string): Promise<JamaRecord[]> {
    this.log.debug({ projectId }, 'MOCK: getTags()');
    return projectId === '1' ? clone(TAGS) : [];
  }

  async getTaggedItems(tagId: string): Promise<JamaRecord[]> {
    this.log.debug({ tagId }, 'MOCK: getTaggedItems()');
    return tagId === '301' ? this.lookupAll(['123']) : [];
  }

  async getTestCycle(testCycleId: string): Promise<JamaRecord | null> {
    this.log.debug({ testCycleId }, 'MOCK: getTestCycle()');
    return testCycleId === '501' ? clone(TEST_CYCLE_501) : null;
  }

  async getTestRuns(testCycleId: string): Promise<JamaRecord[]> {
    this.log.debug({ testCycleId }, 'MOCK: getTestRuns()');
    return testCycleId === '501' ? clone(TEST_RUNS_501) : [];
  }

  async getAvailableEndpoints(): Promise<JamaRecord> {
    this.log.debug('MOCK: getAvailableEndpoints()');
    return { data: [{ path: '/mock', method: 'GET' }] };
  }

  async postItem(input: ItemInput): Promise<number> {
    this.log.debug({ project: input.project, itemTypeId: input.itemTypeId }, 'MOCK: postItem()');
    return MOCK_CREATED_IDS.item;
  }

  async postTag(name: string, project: number): Promise<number> {
    this.log.debug({ name, project }, 'MOCK: postTag()');
    return MOCK_CREATED_IDS.tag;
  }

  async postItemTag(itemId: number, tagId: number): Promise<number> {
    this.log.debug({ itemId, tagId }, 'MOCK: postItemTag()');
    return 201;
  }

  async putItem(input: ItemUpdateInput): Promise<number> {
    this.log.debug({ itemId: input.itemId }, 'MOCK: putItem()');
    return 200;
  }

  async postProject(input: ProjectInput): Promise<number> {
    this.log.debug({ name: input.name, projectKey: input.projectKey }, 'MOCK: postProject()');
    return MOCK_CREATED_IDS.project;
  }

  async postRelationship(input: RelationshipInput): Promise<number> {
    this.log.debug({ fromItem: input.fromItem, toItem: input.toItem }, 'MOCK: postRelationship()');
    return MOCK_CREATED_IDS.relationship;
  }
}
