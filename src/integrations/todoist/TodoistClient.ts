/**
 * Todoist API client
 *
 * Reads active tasks and projects through the official Todoist SDK,
 * following pagination cursors and validating each record.
 */

import { TodoistApi } from '@doist/todoist-api-typescript';
import { z } from 'zod';
import { UpstreamRequestError } from '../../utils/errors.js';

export const TODOIST_API_URL = 'https://api.todoist.com/api/v1';

export const TodoistDueSchema = z
  .object({
    date: z.string(),
    string: z.string().nullish(),
    isRecurring: z.boolean().default(false),
    timezone: z.string().nullish()
  })
  .passthrough();

export type TodoistDue = z.infer<typeof TodoistDueSchema>;

export const TodoistTaskSchema = z
  .object({
    id: z.string(),
    content: z.string(),
    description: z.string().nullish(),
    priority: z.number().int().min(1).max(4).default(1),
    labels: z.array(z.string()).default([]),
    projectId: z.string(),
    due: TodoistDueSchema.nullish()
  })
  .passthrough();

export type TodoistTask = z.infer<typeof TodoistTaskSchema>;

export const TodoistProjectSchema = z
  .object({
    id: z.string(),
    name: z.string()
  })
  .passthrough();

export type TodoistProject = z.infer<typeof TodoistProjectSchema>;

export interface TodoistPage {
  results: unknown[];
  nextCursor?: string | null;
}

export interface PageArgs {
  cursor?: string | null;
  limit?: number;
}

/** The SDK calls the client makes */
export interface TodoistSdk {
  getTasks(args?: PageArgs): Promise<TodoistPage>;
  getProjects(args?: PageArgs): Promise<TodoistPage>;
}

export interface TodoistClientOptions {
  apiToken: string;
  pageSize?: number;
  api?: TodoistSdk;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'httpStatusCode' in error) {
    return typeof error.httpStatusCode === 'number' ? error.httpStatusCode : undefined;
  }
  return undefined;
}

export class TodoistClient {
  private readonly api: TodoistSdk;
  private readonly pageSize: number;

  constructor(options: TodoistClientOptions) {
    this.api = options.api ?? new TodoistApi(options.apiToken);
    this.pageSize = options.pageSize ?? 200;
  }

  /**
   * All active tasks
   */
  async getTasks(): Promise<TodoistTask[]> {
    return this.collect('/tasks', args => this.api.getTasks(args), TodoistTaskSchema);
  }

  /**
   * All projects
   */
  async getProjects(): Promise<TodoistProject[]> {
    return this.collect('/projects', args => this.api.getProjects(args), TodoistProjectSchema);
  }

  private async collect<T extends z.ZodTypeAny>(
    path: string,
    fetchPage: (args: PageArgs) => Promise<TodoistPage>,
    item: T
  ): Promise<Array<z.infer<T>>> {
    const url = `${TODOIST_API_URL}${path}`;
    const results: Array<z.infer<T>> = [];
    let cursor: string | null = null;

    do {
      let page: TodoistPage;
      try {
        page = await fetchPage({ cursor, limit: this.pageSize });
      } catch (error) {
        throw new UpstreamRequestError(url, error, statusOf(error));
      }
      results.push(...z.array(item).parse(page.results));
      cursor = page.nextCursor ?? null;
    } while (cursor);

    return results;
  }
}
