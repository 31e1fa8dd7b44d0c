// Descriptors of the Tool Backend's todo operations
// Used when discovery is disabled or the backend cannot be listed at startup

import type { ToolDescriptor } from './types.js';

export const BUILTIN_TOOL_DESCRIPTORS: readonly ToolDescriptor[] = [
  {
    name: 'create',
    description: 'Create a new todo item with a title and an optional description.',
    inputSchema: {
      type: 'object',
      properties: {
        title: { type: 'string', minLength: 1, maxLength: 200, description: 'Short title of the todo' },
        description: { type: 'string', maxLength: 2000, description: 'Optional longer description' },
      },
      required: ['title'],
    },
    destructive: false,
  },
  {
    name: 'list',
    description: 'List all todo items in creation order.',
    inputSchema: { type: 'object', properties: {} },
    destructive: false,
  },
  {
    name: 'update',
    description: 'Update the title, description or status of an existing todo.',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'integer', description: 'Id of the todo to update' },
        title: { type: 'string', minLength: 1, maxLength: 200 },
        description: { type: 'string', maxLength: 2000 },
        status: { type: 'string', enum: ['active', 'completed', 'archived'] },
      },
      required: ['id'],
    },
    destructive: false,
  },
  {
    name: 'delete',
    description: 'Permanently delete a todo. Requires confirmation set to true after the user agreed.',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'integer', description: 'Id of the todo to delete' },
        confirmation: { type: 'boolean', description: 'Must be true; ask the user before setting it' },
      },
      required: ['id', 'confirmation'],
    },
    destructive: true,
  },
];
