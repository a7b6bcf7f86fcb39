import { ZodError } from 'zod';
import type { Logger } from 'pino';
import { JamaMcpError, NotFoundError, ValidationError } from '../core/errors.js';
import { JAMA_CLIENT } from '../core/types.js';
import type { JamaClient, JamaRecord, LifespanContext } from '../core/types.js';
import {
  ItemCreateSchema,
  ItemIdSchema,
  ItemTagAddSchema,
  ItemTypeIdSchema,
  ItemUpdateSchema,
  NoArgsSchema,
  PickListIdSchema,
  PickListOptionIdSchema,
  ProjectCreateSchema,
  ProjectIdSchema,
  RelationshipCreateSchema,
  RelationshipIdSchema,
  TagCreateSchema,
  TagIdSchema,
  TestCycleIdSchema
} from './schemas.js';

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required: string[];
  };
};

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function idTool(name: string, description: string, arg: string, argDescription: string): ToolDefinition {
  return {
    name,
    description,
    inputSchema: {
      type: 'object',
      properties: { [arg]: { type: 'string', description: argDescription } },
      required: [arg]
    }
  };
}

function noArgTool(name: string, description: string): ToolDefinition {
  return { name, description, inputSchema: { type: 'object', properties: {}, required: [] } };
}

const LOCATION_PROPERTY = {
  type: 'object',
  description: 'Parent of the item: {"item": <parent item ID>} or {"project": <project ID>}',
  properties: {
    item: { type: 'integer' },
    project: { type: 'integer' }
  }
};

const FIELDS_PROPERTY = {
  type: 'object',
  description: 'Item field values keyed by field name, e.g. {"name": "...", "description": "..."}'
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  noArgTool('get_jama_projects', 'List all projects visible to the configured Jama client.'),
  idTool('get_jama_item', 'Get a single item by its API ID.', 'item_id', 'Item ID'),
  idTool('get_jama_project_items', 'List all items in a project.', 'project_id', 'Project ID'),
  idTool('get_jama_item_children', 'List the child items of an item.', 'item_id', 'Parent item ID'),
  idTool('get_jama_relationships', 'List all relationships in a project.', 'project_id', 'Project ID'),
  idTool('get_jama_relationship', 'Get a single relationship by its ID.', 'relationship_id', 'Relationship ID'),
  idTool(
    'get_jama_item_upstream_relationships',
    'List relationships where the item is the downstream end.',
    'item_id',
    'Item ID'
  ),
  idTool(
    'get_jama_item_downstream_relationships',
    'List relationships where the item is the upstream end.',
    'item_id',
    'Item ID'
  ),
  idTool('get_jama_item_upstream_related', 'List the items upstream of an item (traceability).', 'item_id', 'Item ID'),
  idTool(
    'get_jama_item_downstream_related',
    'List the items downstream of an item (traceability).',
    'item_id',
    'Item ID'
  ),
  noArgTool('get_jama_item_types', 'List all item types.'),
  idTool('get_jama_item_type', 'Get a single item type by its ID.', 'item_type_id', 'Item type ID'),
  noArgTool('get_jama_pick_lists', 'List all pick lists.'),
  idTool('get_jama_pick_list', 'Get a single pick list by its ID.', 'pick_list_id', 'Pick list ID'),
  idTool('get_jama_pick_list_options', 'List the options of a pick list.', 'pick_list_id', 'Pick list ID'),
  idTool(
    'get_jama_pick_list_option',
    'Get a single pick list option by its ID.',
    'pick_list_option_id',
    'Pick list option ID'
  ),
  idTool('get_jama_tags', 'List the tags defined in a project.', 'project_id', 'Project ID'),
  idTool('get_jama_tagged_items', 'List the items carrying a tag.', 'tag_id', 'Tag ID'),
  idTool('get_jama_test_cycle', 'Get a single test cycle by its ID.', 'test_cycle_id', 'Test cycle ID'),
  idTool('get_jama_test_runs', 'List the test runs of a test cycle.', 'test_cycle_id', 'Test cycle ID'),
  {
    name: 'create_item',
    description: 'Create an item and return it as stored by Jama.',
    inputSchema: {
      type: 'object',
      properties: {
        project: { type: 'integer', description: 'Project ID to create the item in' },
        item_type_id: { type: 'integer', description: 'Item type of the new item' },
        child_item_type_id: { type: 'integer', description: 'Item type for children of the new item' },
        location: LOCATION_PROPERTY,
        fields: FIELDS_PROPERTY
      },
      required: ['project', 'item_type_id', 'child_item_type_id', 'location', 'fields']
    }
  },
  {
    name: 'create_tag',
    description: 'Create a tag in a project. Returns the new tag ID.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Display name of the tag' },
        project: { type: 'integer', description: 'Project ID' }
      },
      required: ['name', 'project']
    }
  },
  {
    name: 'add_jama_item_tag',
    description: 'Attach an existing tag to an item. Returns the HTTP status (201 on success).',
    inputSchema: {
      type: 'object',
      properties: {
        item_id: { type: 'integer', description: 'Item ID' },
        tag_id: { type: 'integer', description: 'Tag ID' }
      },
      required: ['item_id', 'tag_id']
    }
  },
  {
    name: 'update_item',
    description: 'Replace an item (PUT). Returns the HTTP status.',
    inputSchema: {
      type: 'object',
      properties: {
        project: { type: 'integer', description: 'Project ID the item belongs to' },
        item_id: { type: 'integer', description: 'Item ID to update' },
        item_type_id: { type: 'integer', description: 'Item type of the item' },
        child_item_type_id: { type: 'integer', description: 'Item type for children of the item' },
        location: LOCATION_PROPERTY,
        fields: FIELDS_PROPERTY
      },
      required: ['project', 'item_id', 'item_type_id', 'child_item_type_id', 'location', 'fields']
    }
  },
  {
    name: 'create_project',
    description: 'Create a project. Returns the new project ID.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Project name' },
        project_key: { type: 'string', description: 'Project key used as document key prefix' },
        item_type_id: { type: 'integer', description: 'Item type for the project' }
      },
      required: ['name', 'project_key', 'item_type_id']
    }
  },
  {
    name: 'create_relationship',
    description: 'Create a relationship from one item to another. Returns the new relationship ID.',
    inputSchema: {
      type: 'object',
      properties: {
        from_item_id: { type: 'integer', description: 'Upstream item ID' },
        to_item_id: { type: 'integer', description: 'Downstream item ID' },
        relationship_type: { type: 'integer', description: 'Relationship type ID (optional, Jama default when omitted)' }
      },
      required: ['from_item_id', 'to_item_id']
    }
  },
  noArgTool(
    'test_jama_connection',
    'Check connectivity and authentication by listing the available API endpoints.'
  )
];

function found(record: JamaRecord | null, resource: string, id: string): JamaRecord {
  if (!record) throw new NotFoundError(resource, id);
  return record;
}

async function runTool(name: string, args: unknown, client: JamaClient): Promise<unknown> {
  switch (name) {
    case 'get_jama_projects': {
      NoArgsSchema.parse(args);
      return client.getProjects();
    }

    case 'get_jama_item': {
      const { item_id } = ItemIdSchema.parse(args);
      return found(await client.getItem(item_id), 'Item', item_id);
    }

    case 'get_jama_project_items': {
      const { project_id } = ProjectIdSchema.parse(args);
      return client.getItems(project_id);
    }

    case 'get_jama_item_children': {
      const { item_id } = ItemIdSchema.parse(args);
      return client.getItemChildren(item_id);
    }

    case 'get_jama_relationships': {
      const { project_id } = ProjectIdSchema.parse(args);
      return client.getRelationships(project_id);
    }

    case 'get_jama_relationship': {
      const { relationship_id } = RelationshipIdSchema.parse(args);
      return found(await client.getRelationship(relationship_id), 'Relationship', relationship_id);
    }

    case 'get_jama_item_upstream_relationships': {
      const { item_id } = ItemIdSchema.parse(args);
      return client.getItemsUpstreamRelationships(item_id);
    }

    case 'get_jama_item_downstream_relationships': {
      const { item_id } = ItemIdSchema.parse(args);
      return client.getItemsDownstreamRelationships(item_id);
    }

    case 'get_jama_item_upstream_related': {
      const { item_id } = ItemIdSchema.parse(args);
      return client.getItemsUpstreamRelated(item_id);
    }

    case 'get_jama_item_downstream_related': {
      const { item_id } = ItemIdSchema.parse(args);
      return client.getItemsDownstreamRelated(item_id);
    }

    case 'get_jama_item_types': {
      NoArgsSchema.parse(args);
      return client.getItemTypes();
    }

    case 'get_jama_item_type': {
      const { item_type_id } = ItemTypeIdSchema.parse(args);
      return found(await client.getItemType(item_type_id), 'Item type', item_type_id);
    }

    case 'get_jama_pick_lists': {
      NoArgsSchema.parse(args);
      return client.getPickLists();
    }

    case 'get_jama_pick_list': {
      const { pick_list_id } = PickListIdSchema.parse(args);
      return found(await client.getPickList(pick_list_id), 'Pick list', pick_list_id);
    }

    case 'get_jama_pick_list_options': {
      const { pick_list_id } = PickListIdSchema.parse(args);
      return client.getPickListOptions(pick_list_id);
    }

    case 'get_jama_pick_list_option': {
      const { pick_list_option_id } = PickListOptionIdSchema.parse(args);
      return found(await client.getPickListOption(pick_list_option_id), 'Pick list option', pick_list_option_id);
    }

    case 'get_jama_tags': {
      const { project_id } = ProjectIdSchema.parse(args);
      return client.getTags(project_id);
    }

    case 'get_jama_tagged_items': {
      const { tag_id } = TagIdSchema.parse(args);
      return client.getTaggedItems(tag_id);
    }

    case 'get_jama_test_cycle': {
      const { test_cycle_id } = TestCycleIdSchema.parse(args);
      return found(await client.getTestCycle(test_cycle_id), 'Test cycle', test_cycle_id);
    }

    case 'get_jama_test_runs': {
      const { test_cycle_id } = TestCycleIdSchema.parse(args);
      return client.getTestRuns(test_cycle_id);
    }

    case 'create_item': {
      const input = ItemCreateSchema.parse(args);
      const itemId = await client.postItem({
        project: input.project,
        itemTypeId: input.item_type_id,
        childItemTypeId: input.child_item_type_id,
        location: input.location,
        fields: input.fields
      });
      // Return the item as Jama stored it, not the request echo
      return found(await client.getItem(String(itemId)), 'Item', String(itemId));
    }

    case 'create_tag': {
      const input = TagCreateSchema.parse(args);
      return client.postTag(input.name, input.project);
    }

    case 'add_jama_item_tag': {
      const input = ItemTagAddSchema.parse(args);
      return client.postItemTag(input.item_id, input.tag_id);
    }

    case 'update_item': {
      const input = ItemUpdateSchema.parse(args);
      return client.putItem({
        project: input.project,
        itemId: input.item_id,
        itemTypeId: input.item_type_id,
        childItemTypeId: input.child_item_type_id,
        location: input.location,
        fields: input.fields
      });
    }

    case 'create_project': {
      const input = ProjectCreateSchema.parse(args);
      return client.postProject({ name: input.name, projectKey: input.project_key, itemTypeId: input.item_type_id });
    }

    case 'create_relationship': {
      const input = RelationshipCreateSchema.parse(args);
      return client.postRelationship({
        fromItem: input.from_item_id,
        toItem: input.to_item_id,
        relationshipType: input.relationship_type
      });
    }

    case 'test_jama_connection': {
      NoArgsSchema.parse(args);
      return client.getAvailableEndpoints();
    }

    default:
      throw new NotFoundError('Tool', name);
  }
}

function toError(err: unknown): Error {
  if (err instanceof ZodError) {
    const msg = err.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
    return new ValidationError(`Invalid arguments: ${msg}`);
  }
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run one tool against the shared client.
 *
 * Every failure, from bad arguments to a Jama API error, is returned as an
 * `isError` result carrying `{ error, code? }` rather than thrown, so the MCP
 * call itself always completes.
 */
export async function callTool(
  name: string,
  args: unknown,
  ctx: LifespanContext,
  log: Logger
): Promise<ToolResult> {
  log.info({ tool: name }, 'Executing tool');
  try {
    const value = await runTool(name, args ?? {}, ctx[JAMA_CLIENT]);
    return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
  } catch (raw) {
    const err = toError(raw);
    log.warn({ tool: name, err }, 'Tool failed');
    const payload = err instanceof JamaMcpError ? { error: err.message, code: err.code } : { error: err.message };
    return { content: [{ type: 'text', text: JSON.stringify(payload) }], isError: true };
  }
}
