import {
  TOOL_CATALOG,
  ToolRegistry,
  getToolRegistry,
  resetToolRegistry
} from '../../../src/services/tool-registry';
import { TOOL_NAMES } from '../../../src/types/tool.types';

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    resetToolRegistry();
    registry = new ToolRegistry();
  });

  describe('getAllTools', () => {
    it('should return all 21 tools in catalog order', () => {
      const tools = registry.getAllTools();

      expect(tools).toHaveLength(21);
      expect(tools.map((tool) => tool.function.name)).toEqual([...TOOL_NAMES]);
    });

    it('should return tools in function calling format', () => {
      for (const tool of registry.getAllTools()) {
        expect(tool.type).toBe('function');
        expect(tool.function.parameters.type).toBe('object');
        expect(Array.isArray(tool.function.parameters.required)).toBe(true);
      }
    });

    it('should only require parameters the tool declares', () => {
      for (const tool of registry.getAllTools()) {
        const declared = Object.keys(tool.function.parameters.properties);
        for (const field of tool.function.parameters.required) {
          expect(declared).toContain(field);
        }
      }
    });
  });

  describe('getTool', () => {
    it('should return the schema for a named tool', () => {
      const tool = registry.getTool('create_task');

      expect(tool?.function.description).toBe(TOOL_CATALOG.create_task.description);
      expect(tool?.function.parameters.required).toEqual(['task_name']);
      expect(tool?.function.parameters.properties.assigned_to).toEqual({
        type: 'array',
        items: { type: 'string' },
        description: TOOL_CATALOG.create_task.parameters.properties.assigned_to.description
      });
    });

    it('should return undefined for unknown tool', () => {
      expect(registry.getTool('delete_everything')).toBeUndefined();
      expect(registry.hasTool('delete_everything')).toBe(false);
      expect(registry.hasTool('search_database')).toBe(true);
    });

    it('should expose enum constraints', () => {
      expect(registry.getTool('get_all_tasks')?.function.parameters.properties.status_filter.enum).toEqual([
        'complete',
        'incomplete',
        'all'
      ]);
      expect(registry.getTool('update_task_status')?.function.parameters.properties.new_status.enum).toEqual([
        'complete',
        'incomplete'
      ]);
    });
  });

  describe('validateArguments', () => {
    it('should accept valid arguments', () => {
      expect(registry.validateArguments('get_member_info', { member_name: 'Sam' })).toEqual({ valid: true });
    });

    it('should accept tools without parameters and ignore undeclared fields', () => {
      expect(registry.validateArguments('get_all_members', { verbose: true })).toEqual({ valid: true });
    });

    it('should treat null optional fields as absent', () => {
      expect(registry.validateArguments('create_task', { task_name: 'Print posters', deadline: null })).toEqual({
        valid: true
      });
    });

    it('should report an unknown tool', () => {
      expect(registry.validateArguments('delete_everything', {})).toEqual({
        valid: false,
        errors: ['Unknown tool: delete_everything']
      });
    });

    it('should reject a non-object argument bag', () => {
      expect(registry.validateArguments('get_all_tasks', ['complete'])).toEqual({
        valid: false,
        errors: ['Arguments must be an object']
      });
    });

    it('should report every missing required field', () => {
      expect(registry.validateArguments('update_task_status', { new_status: null })).toEqual({
        valid: false,
        errors: ['Missing required field: task_identifier', 'Missing required field: new_status']
      });
    });

    it('should report type mismatches', () => {
      expect(registry.validateArguments('get_member_info', { member_name: 42 })).toEqual({
        valid: false,
        errors: ["Field 'member_name' must be of type string, got number"]
      });
      expect(registry.validateArguments('create_task', { task_name: 'Print posters', assign_to_current_user: 'yes' })).toEqual({
        valid: false,
        errors: ["Field 'assign_to_current_user' must be of type boolean, got string"]
      });
    });

    it('should report values outside an enum', () => {
      expect(registry.validateArguments('get_all_tasks', { status_filter: 'done' })).toEqual({
        valid: false,
        errors: ["Field 'status_filter' must be one of: complete, incomplete, all"]
      });
    });

    it('should check array items', () => {
      expect(registry.validateArguments('create_task', { task_name: 'Print posters', assigned_to: ['Sam', null, 7] })).toEqual({
        valid: false,
        errors: [
          "Field 'assigned_to[1]' must be of type string, got null",
          "Field 'assigned_to[2]' must be of type string, got number"
        ]
      });
    });
  });

  describe('singleton', () => {
    it('should return the same instance until reset', () => {
      const first = getToolRegistry();
      expect(getToolRegistry()).toBe(first);

      resetToolRegistry();
      expect(getToolRegistry()).not.toBe(first);
    });
  });
});
