/**
 * Project tools: list and maintain the project hierarchy
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Project, ProjectNode, ToolResult } from '../types/index.js';
import { getDatabase } from '../services/db/manager.js';
import {
  addProject,
  buildProjectTree,
  loadProjects,
  moveProject,
  removeProject,
  renameProject,
} from '../services/projects/store.js';
import { toolFailure, validationError } from './shared.js';

const pathSchema = z.string().min(1, 'Project path is required');

const addSchema = z.object({
  path: pathSchema,
});

const removeSchema = z.object({
  path: pathSchema,
  recursive: z.boolean().optional().default(false),
});

const renameSchema = z.object({
  path: pathSchema,
  name: z.string().min(1, 'New name is required'),
});

const moveSchema = z.object({
  path: pathSchema,
  parent: z.string().min(1).nullable().optional(),
});

export interface ProjectListData {
  projects: Project[];
  tree: ProjectNode[];
}

export interface ProjectAddData {
  project: Project;
  created: string[];
  message: string;
}

export interface ProjectRemoveData {
  removed: string[];
  message: string;
}

export interface ProjectChangeData {
  project: Project;
  message: string;
}

export const projectListTool: Tool = {
  name: 'timetree_project_list',
  description: 'List every project, as a flat list of dotted paths and as a tree.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export const projectAddTool: Tool = {
  name: 'timetree_project_add',
  description: 'Create a project by dotted path. Missing parent projects are created too.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Dotted project path, e.g. "Client.Website.Backend"',
      },
    },
    required: ['path'],
  },
};

export const projectRemoveTool: Tool = {
  name: 'timetree_project_remove',
  description:
    'Delete a project. Refused while records use it or any subproject; subprojects are only deleted with recursive.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Project path',
      },
      recursive: {
        type: 'boolean',
        description: 'Also delete subprojects (default: false)',
      },
    },
    required: ['path'],
  },
};

export const projectRenameTool: Tool = {
  name: 'timetree_project_rename',
  description: 'Rename the last segment of a project path. Subproject paths follow.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Project path',
      },
      name: {
        type: 'string',
        description: 'New name (a single segment without dots)',
      },
    },
    required: ['path', 'name'],
  },
};

export const projectMoveTool: Tool = {
  name: 'timetree_project_move',
  description: 'Move a project with its subprojects under another parent, or to the top level.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Project path',
      },
      parent: {
        type: ['string', 'null'],
        description: 'New parent path; omit or null for the top level',
      },
    },
    required: ['path'],
  },
};

export async function projectListHandler(_args: Record<string, unknown>): Promise<ToolResult<ProjectListData>> {
  try {
    const projects = loadProjects(getDatabase());
    return {
      success: true,
      data: { projects, tree: buildProjectTree(projects) },
    };
  } catch (error) {
    return toolFailure(error, 'PROJECT_ERROR');
  }
}

export async function projectAddHandler(args: Record<string, unknown>): Promise<ToolResult<ProjectAddData>> {
  const parseResult = addSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  try {
    const { project, created } = addProject(getDatabase(), parseResult.data.path);
    return {
      success: true,
      data: { project, created, message: `Created ${created.join(', ')}` },
    };
  } catch (error) {
    return toolFailure(error, 'PROJECT_ERROR');
  }
}

export async function projectRemoveHandler(args: Record<string, unknown>): Promise<ToolResult<ProjectRemoveData>> {
  const parseResult = removeSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const removed = removeProject(getDatabase(), input.path, { recursive: input.recursive });
    return {
      success: true,
      data: { removed, message: `Deleted ${removed.join(', ')}` },
    };
  } catch (error) {
    return toolFailure(error, 'PROJECT_ERROR');
  }
}

export async function projectRenameHandler(args: Record<string, unknown>): Promise<ToolResult<ProjectChangeData>> {
  const parseResult = renameSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const project = renameProject(getDatabase(), input.path, input.name);
    return {
      success: true,
      data: { project, message: `Renamed ${input.path} to ${project.path}` },
    };
  } catch (error) {
    return toolFailure(error, 'PROJECT_ERROR');
  }
}

export async function projectMoveHandler(args: Record<string, unknown>): Promise<ToolResult<ProjectChangeData>> {
  const parseResult = moveSchema.safeParse(args);
  if (!parseResult.success) {
    return validationError(parseResult.error);
  }

  const input = parseResult.data;

  try {
    const project = moveProject(getDatabase(), input.path, input.parent ?? null);
    return {
      success: true,
      data: { project, message: `Moved ${input.path} to ${project.path}` },
    };
  } catch (error) {
    return toolFailure(error, 'PROJECT_ERROR');
  }
}
