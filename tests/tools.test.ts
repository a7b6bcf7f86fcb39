import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { callTool, TOOL_DEFINITIONS } from '../src/api/tools.js';
import type { ToolResult } from '../src/api/tools.js';
import { JamaApiError } from '../src/core/errors.js';
import { JAMA_CLIENT } from '../src/core/types.js';
import type { JamaClient, JamaRecord, LifespanContext } from '../src/core/types.js';
import { MockJamaClient } from '../src/infra/mockClient.js';

const log = pino({ level: 'silent' });

const ITEM_123 = {
  id: 123,
  documentKey: 'MOCK-1',
  fields: { name: 'Mock Item 123', description: 'A sample item.' }
};

function contextFor(client: JamaClient): LifespanContext {
  return { [JAMA_CLIENT]: client };
}

const mockContext = contextFor(new MockJamaClient(log));

function payload(result: ToolResult): unknown {
  expect(result.content).toHaveLength(1);
  return JSON.parse(result.content[0]?.text ?? '');
}

describe('callTool', () => {
  describe('reads', () => {
    it('lists project items for project 1 and nothing for 99', async () => {
      const found = await callTool('get_jama_project_items', { project_id: '1' }, mockContext, log);
      const empty = await callTool('get_jama_project_items', { project_id: '99' }, mockContext, log);

      expect(found.isError).toBeUndefined();
      expect(payload(found)).toEqual([ITEM_123]);
      expect(payload(empty)).toEqual([]);
    });

    it('accepts numeric IDs', async () => {
      const result = await callTool('get_jama_item', { item_id: 123 }, mockContext, log);
      expect(payload(result)).toEqual(ITEM_123);
    });

    it('pretty-prints successful results', async () => {
      const result = await callTool('get_jama_item', { item_id: '123' }, mockContext, log);
      expect(result.content[0]?.text).toBe(JSON.stringify(ITEM_123, null, 2));
    });

    it('returns identical output for repeated calls', async () => {
      const first = await callTool('get_jama_relationships', { project_id: '1' }, mockContext, log);
      const second = await callTool('get_jama_relationships', { project_id: '1' }, mockContext, log);
      expect(second).toEqual(first);
    });

    it('runs the connection test against the endpoint listing', async () => {
      const result = await callTool('test_jama_connection', {}, mockContext, log);
      expect(payload(result)).toEqual({ data: [{ path: '/mock', method: 'GET' }] });
    });

    it('treats missing arguments as empty for argument-free tools', async () => {
      const result = await callTool('get_jama_pick_lists', undefined, mockContext, log);
      expect(payload(result)).toEqual([
        { id: 20, name: 'Priority' },
        { id: 21, name: 'Status' }
      ]);
    });
  });

  describe('mutations', () => {
    const location = { project: 1 };

    it('creates an item and returns it as stored', async () => {
      const result = await callTool(
        'create_item',
        { project: 1, item_type_id: 10, child_item_type_id: 10, location, fields: { name: 'New' } },
        mockContext,
        log
      );
      expect(payload(result)).toEqual(ITEM_123);
    });

    it('returns the IDs and statuses from the client', async () => {
      const tag = await callTool('create_tag', { name: 'Release', project: 1 }, mockContext, log);
      const itemTag = await callTool('add_jama_item_tag', { item_id: 123, tag_id: 301 }, mockContext, log);
      const update = await callTool(
        'update_item',
        { project: 1, item_id: 123, item_type_id: 10, child_item_type_id: 10, location, fields: { name: 'Renamed' } },
        mockContext,
        log
      );
      const project = await callTool(
        'create_project',
        { name: 'Gamma', project_key: 'GAM', item_type_id: 10 },
        mockContext,
        log
      );
      const relationship = await callTool(
        'create_relationship',
        { from_item_id: 123, to_item_id: 456 },
        mockContext,
        log
      );

      expect(payload(tag)).toBe(303);
      expect(payload(itemTag)).toBe(201);
      expect(payload(update)).toBe(200);
      expect(payload(project)).toBe(3);
      expect(payload(relationship)).toBe(103);
    });

    it('rejects a location naming both parents', async () => {
      const result = await callTool(
        'create_item',
        { project: 1, item_type_id: 10, child_item_type_id: 10, location: { item: 5, project: 1 }, fields: {} },
        mockContext,
        log
      );

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({
        error: "Invalid arguments: location: location must name exactly one parent: 'item' or 'project'",
        code: 'VALIDATION_ERROR'
      });
    });
  });

  describe('errors', () => {
    it('reports a missing single record as not found', async () => {
      const result = await callTool('get_jama_item', { item_id: '999' }, mockContext, log);

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({ error: 'Item not found: 999', code: 'NOT_FOUND' });
    });

    it('reports missing test cycles the same way', async () => {
      const result = await callTool('get_jama_test_cycle', { test_cycle_id: '502' }, mockContext, log);
      expect(payload(result)).toEqual({ error: 'Test cycle not found: 502', code: 'NOT_FOUND' });
    });

    it('reports invalid arguments', async () => {
      const result = await callTool('get_jama_item', {}, mockContext, log);

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({
        error: expect.stringMatching(/^Invalid arguments: item_id: /),
        code: 'VALIDATION_ERROR'
      });
    });

    it('rejects a boolean where a numeric ID is required', async () => {
      const result = await callTool('create_tag', { name: 'Release', project: true }, mockContext, log);

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({ error: 'Invalid arguments: project: Invalid input', code: 'VALIDATION_ERROR' });
    });

    it('accepts numeric IDs written as digit strings', async () => {
      const result = await callTool('create_tag', { name: 'Release', project: '7' }, mockContext, log);
      expect(payload(result)).toBe(303);
    });

    it('rejects non-positive numeric IDs', async () => {
      const result = await callTool('add_jama_item_tag', { item_id: '0', tag_id: 301 }, mockContext, log);

      expect(result.isError).toBe(true);
      expect(payload(result)).toMatchObject({ code: 'VALIDATION_ERROR' });
    });

    it('reports unknown tools', async () => {
      const result = await callTool('delete_everything', {}, mockContext, log);
      expect(payload(result)).toEqual({ error: 'Tool not found: delete_everything', code: 'NOT_FOUND' });
    });

    it('returns client failures as error results', async () => {
      class FailingClient extends MockJamaClient {
        override async getProjects(): Promise<JamaRecord[]> {
          throw new Error('API unavailable');
        }
      }

      const result = await callTool('get_jama_projects', {}, contextFor(new FailingClient(log)), log);

      expect(result.isError).toBe(true);
      expect(payload(result)).toEqual({ error: 'API unavailable' });
    });

    it('carries the code of Jama API errors', async () => {
      class RejectingClient extends MockJamaClient {
        override async getTags(): Promise<JamaRecord[]> {
          throw new JamaApiError(403, 'GET', 'tags', 'forbidden');
        }
      }

      const result = await callTool('get_jama_tags', { project_id: '1' }, contextFor(new RejectingClient(log)), log);

      expect(payload(result)).toEqual({
        error: 'Jama API GET tags failed with HTTP 403: forbidden',
        code: 'JAMA_API_ERROR'
      });
    });
  });

  it('defines a dispatchable tool for every listed name', async () => {
    for (const tool of TOOL_DEFINITIONS) {
      const result = await callTool(tool.name, {}, mockContext, log);
      expect(payload(result)).not.toEqual({ error: `Tool not found: ${tool.name}`, code: 'NOT_FOUND' });
    }
  });
});
