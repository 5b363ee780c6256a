/**
 * Project hierarchy storage
 *
 * Each row holds one path segment and its parent; full dotted paths are
 * derived from the parent chain, so renaming a project renames every path
 * below it.
 */

import Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import { TimeTreeError } from '../../utils/errors.js';
import type { Project, ProjectNode } from '../../types/index.js';

interface ProjectRow {
  id: number;
  parent: number | null;
  name: string;
}

export interface AddProjectResult {
  project: Project;
  created: string[]; // Paths created, ancestors first
}

export interface RemoveProjectOptions {
  recursive?: boolean | undefined;
}

export const PATH_SEPARATOR = '.';

const SEGMENT_PATTERN = /^[^\s.]+$/;

const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

/**
 * Natural ordering: "Task2" before "Task10"
 */
export function compareNatural(a: string, b: string): number {
  return collator.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0);
}

/**
 * Split and validate a dotted project path
 */
export function splitProjectPath(path: string): string[] {
  const segments = path.trim().split(PATH_SEPARATOR);
  for (const segment of segments) {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new TimeTreeError(
        `Invalid project path "${path}": segments must be non-empty and contain no dots or spaces`,
        'INVALID'
      );
    }
  }
  return segments;
}

export function validateProjectName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.includes(PATH_SEPARATOR)) {
    throw new TimeTreeError(
      `Cannot rename to "${name}": a name cannot change the path, move the project instead`,
      'INVALID'
    );
  }
  if (!SEGMENT_PATTERN.test(trimmed)) {
    throw new TimeTreeError(`Invalid project name "${name}"`, 'INVALID');
  }
  return trimmed;
}

/**
 * Load every project with its full path, naturally sorted by path
 */
export function loadProjects(db: Database.Database): Project[] {
  const rows = db.prepare('SELECT id, parent, name FROM projects').all() as ProjectRow[];
  const byId = new Map(rows.map((row) => [row.id, row]));
  const paths = new Map<number, string>();

  const pathOf = (row: ProjectRow, seen: Set<number>): string => {
    const cached = paths.get(row.id);
    if (cached !== undefined) return cached;
    if (seen.has(row.id)) {
      throw new TimeTreeError(`Project hierarchy contains a cycle at id ${row.id}`, 'INVALID');
    }
    seen.add(row.id);

    const parent = row.parent === null ? undefined : byId.get(row.parent);
    const path = parent ? `${pathOf(parent, seen)}${PATH_SEPARATOR}${row.name}` : row.name;
    paths.set(row.id, path);
    return path;
  };

  return rows
    .map((row) => ({
      id: row.id,
      parentId: row.parent,
      name: row.name,
      path: pathOf(row, new Set()),
    }))
    .sort((a, b) => compareNatural(a.path, b.path));
}

/**
 * Arrange projects into a forest, children naturally sorted by name
 */
export function buildProjectTree(projects: Project[]): ProjectNode[] {
  const nodes = new Map<number, ProjectNode>();
  for (const project of projects) {
    nodes.set(project.id, { ...project, children: [] });
  }

  const roots: ProjectNode[] = [];
  for (const node of nodes.values()) {
    const parent = node.parentId === null ? undefined : nodes.get(node.parentId);
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }

  const sortNodes = (list: ProjectNode[]): void => {
    list.sort((a, b) => compareNatural(a.name, b.name));
    for (const node of list) sortNodes(node.children);
  };
  sortNodes(roots);

  return roots;
}

export function getProjectTree(db: Database.Database): ProjectNode[] {
  return buildProjectTree(loadProjects(db));
}

/**
 * Ids of every project below `id`, at any depth
 */
export function getDescendantIds(projects: Project[], id: number): number[] {
  const childrenOf = new Map<number, number[]>();
  for (const project of projects) {
    if (project.parentId === null) continue;
    const siblings = childrenOf.get(project.parentId) ?? [];
    siblings.push(project.id);
    childrenOf.set(project.parentId, siblings);
  }

  const result: number[] = [];
  const pending = [...(childrenOf.get(id) ?? [])];
  while (pending.length > 0) {
    const next = pending.pop();
    if (next === undefined || result.includes(next)) continue;
    result.push(next);
    pending.push(...(childrenOf.get(next) ?? []));
  }
  return result;
}

export function findProject(db: Database.Database, path: string): Project | null {
  const wanted = path.trim();
  return loadProjects(db).find((project) => project.path === wanted) ?? null;
}

export function requireProject(db: Database.Database, path: string): Project {
  const project = findProject(db, path);
  if (!project) {
    throw new TimeTreeError(`Unknown project: ${path}`, 'NOT_FOUND');
  }
  return project;
}

function findChild(db: Database.Database, parentId: number | null, name: string): ProjectRow | undefined {
  return db
    .prepare('SELECT id, parent, name FROM projects WHERE COALESCE(parent, 0) = ? AND name = ?')
    .get(parentId ?? 0, name) as ProjectRow | undefined;
}

/**
 * Create a project, creating missing ancestors on the way
 */
export function addProject(db: Database.Database, path: string): AddProjectResult {
  const segments = splitProjectPath(path);
  const fullPath = segments.join(PATH_SEPARATOR);

  if (findProject(db, fullPath)) {
    throw new TimeTreeError(`Project already exists: ${fullPath}`, 'CONFLICT');
  }

  const insert = db.prepare('INSERT INTO projects (parent, name) VALUES (?, ?)');
  const created: string[] = [];

  db.transaction(() => {
    let parentId: number | null = null;
    for (const [i, segment] of segments.entries()) {
      const existing = findChild(db, parentId, segment);
      if (existing) {
        parentId = existing.id;
        continue;
      }
      const info = insert.run(parentId, segment);
      parentId = Number(info.lastInsertRowid);
      created.push(segments.slice(0, i + 1).join(PATH_SEPARATOR));
    }
  })();

  logger.info(`Created project ${fullPath}`, { created });

  return { project: requireProject(db, fullPath), created };
}

/**
 * Change the last path segment of a project
 */
export function renameProject(db: Database.Database, path: string, newName: string): Project {
  const name = validateProjectName(newName);
  const project = requireProject(db, path);

  if (name === project.name) {
    return project;
  }

  const clash = findChild(db, project.parentId, name);
  if (clash) {
    throw new TimeTreeError(`A sibling project named "${name}" already exists`, 'CONFLICT');
  }

  db.prepare('UPDATE projects SET name = ? WHERE id = ?').run(name, project.id);
  logger.info(`Renamed project ${project.path} to ${name}`);

  const renamed = loadProjects(db).find((p) => p.id === project.id);
  if (!renamed) {
    throw new TimeTreeError(`Project ${project.id} vanished during rename`, 'NOT_FOUND');
  }
  return renamed;
}

/**
 * Reparent a project; null moves it to the top level
 */
export function moveProject(db: Database.Database, path: string, newParentPath: string | null): Project {
  const projects = loadProjects(db);
  const project = requireProject(db, path);
  const parent = newParentPath === null ? null : requireProject(db, newParentPath);

  if (parent && (parent.id === project.id || getDescendantIds(projects, project.id).includes(parent.id))) {
    throw new TimeTreeError(`Cannot move ${project.path} below itself`, 'INVALID');
  }

  const parentId = parent?.id ?? null;
  if (parentId === project.parentId) {
    return project;
  }

  if (findChild(db, parentId, project.name)) {
    const where = parent ? parent.path : 'the top level';
    throw new TimeTreeError(`A project named "${project.name}" already exists under ${where}`, 'CONFLICT');
  }

  db.prepare('UPDATE projects SET parent = ? WHERE id = ?').run(parentId, project.id);
  logger.info(`Moved project ${project.path} under ${parent?.path ?? '(top level)'}`);

  const moved = loadProjects(db).find((p) => p.id === project.id);
  if (!moved) {
    throw new TimeTreeError(`Project ${project.id} vanished during move`, 'NOT_FOUND');
  }
  return moved;
}

/**
 * Delete a project (and its subtree with `recursive`)
 *
 * Refused while any record points into the subtree.
 */
export function removeProject(
  db: Database.Database,
  path: string,
  options: RemoveProjectOptions = {}
): string[] {
  const projects = loadProjects(db);
  const project = requireProject(db, path);
  const descendants = getDescendantIds(projects, project.id);
  const subtree = [project.id, ...descendants];

  const placeholders = subtree.map(() => '?').join(', ');
  const used = db
    .prepare(`SELECT id FROM records WHERE project_id IN (${placeholders}) ORDER BY id`)
    .all(...subtree) as { id: number }[];

  if (used.length > 0) {
    throw new TimeTreeError(
      `Cannot delete project ${project.path}: used by records ${used.map((r) => r.id).join(', ')}`,
      'IN_USE',
      { records: used.map((r) => r.id) }
    );
  }

  if (descendants.length > 0 && !options.recursive) {
    throw new TimeTreeError(
      `Project ${project.path} has subprojects; remove them first or delete recursively`,
      'INVALID'
    );
  }

  const removed = projects
    .filter((p) => subtree.includes(p.id))
    .map((p) => p.path);

  // Deepest first so parent references never dangle
  const depthOf = (id: number): number =>
    projects.find((p) => p.id === id)?.path.split(PATH_SEPARATOR).length ?? 0;
  const ordered = [...subtree].sort((a, b) => depthOf(b) - depthOf(a));

  const remove = db.prepare('DELETE FROM projects WHERE id = ?');
  db.transaction(() => {
    for (const id of ordered) remove.run(id);
  })();

  logger.info(`Deleted project ${project.path}`, { removed });
  return removed;
}
