/**
 * Tool Registry
 *
 * Function-calling schemas for every tool the assistant may invoke, plus
 * lookup and argument validation against those schemas. The catalog is keyed
 * by ToolName, so adding a tool without a schema (or the reverse) fails to compile.
 */

import { SEARCH_SCOPES, STATUS_FILTERS, TOOL_NAMES, ToolName } from '../types/tool.types';
import { TASK_STATUSES } from '../types/record.types';

// ============================================
// JSON Schema Types
// ============================================

/**
 * JSON Schema type definitions for tool parameters
 */
export interface JsonSchema {
  type: 'string' | 'boolean' | 'array';
  description?: string;
  enum?: readonly string[];
  items?: JsonSchema;
}

// ============================================
// Tool Definition Types
// ============================================

export interface ToolParameters {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required: string[];
}

/**
 * Function calling tool definition, in the chat completions `tools` format
 */
export interface ToolDefinition {
  type: 'function';
  function: {
    name: ToolName;
    description: string;
    parameters: ToolParameters;
  };
}

/**
 * Result of validating tool arguments against schema
 */
export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

const NO_PARAMETERS: ToolParameters = { type: 'object', properties: {}, required: [] };

const TASK_IDENTIFIER: JsonSchema = {
  type: 'string',
  description: 'Task name (partial match) or task ID'
};

const MEETING_IDENTIFIER: JsonSchema = {
  type: 'string',
  description: 'Meeting name (partial match) or meeting ID'
};

export const TOOL_CATALOG = {
  // Retrieval
  get_my_tasks: {
    description: 'Get all tasks assigned to the current user (the person chatting). Returns task details including name, description, deadline, and status.',
    parameters: NO_PARAMETERS
  },
  get_current_datetime: {
    description: 'Get the current date and time in the configured time zone of the server.',
    parameters: NO_PARAMETERS
  },
  get_my_identity: {
    description: 'Identify which member the current chat user is. Returns their name, role, subgroup, email, and chat ID.',
    parameters: NO_PARAMETERS
  },
  get_all_tasks: {
    description: 'Get all tasks in the system, optionally filtered by status (complete/incomplete).',
    parameters: {
      type: 'object',
      properties: {
        status_filter: {
          type: 'string',
          description: "Filter by status: 'complete', 'incomplete', or 'all'",
          enum: STATUS_FILTERS
        }
      },
      required: []
    }
  },
  get_member_info: {
    description: 'Get information about a member by name, including email, role, subgroup, chat ID, projects, and tasks.',
    parameters: {
      type: 'object',
      properties: {
        member_name: { type: 'string', description: 'The name of the member to look up (fuzzy matching supported)' }
      },
      required: ['member_name']
    }
  },
  get_meeting_info: {
    description: 'Get information about a meeting including summary, attendees, topics discussed, and tasks assigned. Can search by name or ID.',
    parameters: {
      type: 'object',
      properties: { meeting_identifier: MEETING_IDENTIFIER },
      required: ['meeting_identifier']
    }
  },
  get_meetings_for_member: {
    description: 'Get all meetings that a specific member attended.',
    parameters: {
      type: 'object',
      properties: {
        member_name: { type: 'string', description: 'The name of the member' }
      },
      required: ['member_name']
    }
  },
  get_missed_meetings: {
    description: 'Get meetings that the current user did NOT attend, along with what was covered.',
    parameters: NO_PARAMETERS
  },
  get_project_info: {
    description: 'Get information about a project including description, team members, and related tasks.',
    parameters: {
      type: 'object',
      properties: {
        project_name: { type: 'string', description: 'The name of the project (partial match) or project ID' }
      },
      required: ['project_name']
    }
  },
  get_all_projects: {
    description: 'Get a list of all projects in the system.',
    parameters: NO_PARAMETERS
  },
  get_all_members: {
    description: 'Get a list of all members.',
    parameters: NO_PARAMETERS
  },
  get_topic_info: {
    description: 'Get information about a topic and which meetings discussed it.',
    parameters: {
      type: 'object',
      properties: {
        topic_name: { type: 'string', description: 'The name of the topic (partial match) or topic ID' }
      },
      required: ['topic_name']
    }
  },
  search_database: {
    description: "General search across the database for any information. Use this when other specific tools don't fit.",
    parameters: {
      type: 'object',
      properties: {
        search_query: { type: 'string', description: 'What to search for' },
        search_in: {
          type: 'string',
          description: "Where to search: 'members', 'meetings', 'projects', 'tasks', 'topics', or 'all'",
          enum: SEARCH_SCOPES
        }
      },
      required: ['search_query']
    }
  },

  // Edits
  update_task_status: {
    description: "Update a task's status to 'complete' or 'incomplete'. Use when the user says they finished a task or need to reopen one.",
    parameters: {
      type: 'object',
      properties: {
        task_identifier: TASK_IDENTIFIER,
        new_status: {
          type: 'string',
          description: "New status: 'complete' or 'incomplete'",
          enum: TASK_STATUSES
        }
      },
      required: ['task_identifier', 'new_status']
    }
  },
  assign_member_to_task: {
    description: 'Assign a member to an existing task.',
    parameters: {
      type: 'object',
      properties: {
        task_identifier: TASK_IDENTIFIER,
        member_name: { type: 'string', description: 'Name of the member to assign' }
      },
      required: ['task_identifier', 'member_name']
    }
  },
  remove_member_from_task: {
    description: 'Remove a member from a task assignment.',
    parameters: {
      type: 'object',
      properties: {
        task_identifier: TASK_IDENTIFIER,
        member_name: { type: 'string', description: 'Name of the member to remove' }
      },
      required: ['task_identifier', 'member_name']
    }
  },

  // Creation
  create_task: {
    description: 'Create a new task. Use this whenever the user says they are starting or creating a task. If any required information is missing, ask the user for it.',
    parameters: {
      type: 'object',
      properties: {
        task_name: { type: 'string', description: 'Name/title of the task' },
        task_description: { type: 'string', description: 'Detailed description of what needs to be done' },
        deadline: { type: 'string', description: 'Deadline in YYYY-MM-DD format, or null if none' },
        assigned_to: {
          type: 'array',
          items: { type: 'string' },
          description: "List of member names to assign this task to. If the user says things like 'for me', either put their member name here or set assign_to_current_user=true."
        },
        assign_to_current_user: {
          type: 'boolean',
          description: "Set to true when the user clearly wants the task assigned to themselves (e.g. 'I'm starting a new task for me')."
        }
      },
      required: ['task_name']
    }
  },
  create_project: {
    description: 'Create a new project with optional team members.',
    parameters: {
      type: 'object',
      properties: {
        project_name: { type: 'string', description: 'Name of the project' },
        project_description: { type: 'string', description: 'Description of the project' },
        team_members: {
          type: 'array',
          items: { type: 'string' },
          description: 'List of member names to add to this project'
        }
      },
      required: ['project_name']
    }
  },
  add_member_to_project: {
    description: 'Add a member to an existing project.',
    parameters: {
      type: 'object',
      properties: {
        project_name: { type: 'string', description: 'Name of the project (partial match) or project ID' },
        member_name: { type: 'string', description: 'Name of the member to add' }
      },
      required: ['project_name', 'member_name']
    }
  },
  create_topic: {
    description: 'Create a new discussion topic.',
    parameters: {
      type: 'object',
      properties: {
        topic_name: { type: 'string', description: 'Name of the topic' },
        topic_description: { type: 'string', description: 'Description of the topic' }
      },
      required: ['topic_name']
    }
  },
  add_topic_to_meeting: {
    description: 'Link an existing or new topic to a meeting. The topic is created when none matches.',
    parameters: {
      type: 'object',
      properties: {
        meeting_identifier: MEETING_IDENTIFIER,
        topic_name: { type: 'string', description: 'Name of the topic to link' }
      },
      required: ['meeting_identifier', 'topic_name']
    }
  }
} satisfies Record<ToolName, Omit<ToolDefinition['function'], 'name'>>;

// ============================================
// Tool Registry Class
// ============================================

/**
 * Registry of all available tools for function calling
 */
export class ToolRegistry {
  private tools: Map<string, ToolDefinition>;

  constructor() {
    this.tools = new Map();
    for (const name of TOOL_NAMES) {
      const entry = TOOL_CATALOG[name];
      this.tools.set(name, {
        type: 'function',
        function: { name, description: entry.description, parameters: entry.parameters }
      });
    }
  }

  /**
   * Get all tool definitions, in catalog order
   */
  getAllTools(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  getTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Validate tool arguments against schema
   *
   * Checks that required fields are present, field types match the schema,
   * enum values are allowed and array items have the declared type.
   * Fields the schema does not declare are ignored.
   */
  validateArguments(toolName: string, args: unknown): ValidationResult {
    const tool = this.getTool(toolName);

    if (!tool) {
      return {
        valid: false,
        errors: [`Unknown tool: ${toolName}`]
      };
    }

    if (!isPlainObject(args)) {
      return {
        valid: false,
        errors: ['Arguments must be an object']
      };
    }

    const errors: string[] = [];
    const schema = tool.function.parameters;

    for (const requiredField of schema.required) {
      if (args[requiredField] === undefined || args[requiredField] === null) {
        errors.push(`Missing required field: ${requiredField}`);
      }
    }

    for (const [fieldName, fieldValue] of Object.entries(args)) {
      const fieldSchema = schema.properties[fieldName];
      if (!fieldSchema) {
        continue;
      }
      errors.push(...this.validateField(fieldName, fieldValue, fieldSchema));
    }

    return {
      valid: errors.length === 0,
      errors: errors.length > 0 ? errors : undefined
    };
  }

  /**
   * Validate a single field against its schema
   */
  private validateField(fieldName: string, value: unknown, schema: JsonSchema): string[] {
    const errors: string[] = [];

    // Absent optional values are fine; required ones were reported already
    if (value === null || value === undefined) {
      return errors;
    }

    const actualType = this.getJsonType(value);
    if (actualType !== schema.type) {
      errors.push(`Field '${fieldName}' must be of type ${schema.type}, got ${actualType}`);
      return errors;
    }

    if (schema.enum && typeof value === 'string' && !schema.enum.includes(value)) {
      errors.push(`Field '${fieldName}' must be one of: ${schema.enum.join(', ')}`);
    }

    if (schema.type === 'array' && schema.items && Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        const item: unknown = value[i];
        // Array items must be present, unlike optional fields
        if (item === null || item === undefined) {
          errors.push(`Field '${fieldName}[${i}]' must be of type ${schema.items.type}, got ${this.getJsonType(item)}`);
          continue;
        }
        errors.push(...this.validateField(`${fieldName}[${i}]`, item, schema.items));
      }
    }

    return errors;
  }

  /**
   * Get the JSON Schema type of a value
   */
  private getJsonType(value: unknown): string {
    if (Array.isArray(value)) {
      return 'array';
    }
    if (value === null) {
      return 'null';
    }
    return typeof value;
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// Singleton Instance
// ============================================

let toolRegistryInstance: ToolRegistry | null = null;

/**
 * Get the singleton ToolRegistry instance
 */
export function getToolRegistry(): ToolRegistry {
  if (!toolRegistryInstance) {
    toolRegistryInstance = new ToolRegistry();
  }
  return toolRegistryInstance;
}

/**
 * Reset the singleton instance (for testing)
 */
export function resetToolRegistry(): void {
  toolRegistryInstance = null;
}
