/**
 * Todoist integration - tasks and projects from Todoist.
 *
 * Snapshots list every active task and bucket them into overdue, today and
 * upcoming. With `use_sync` enabled the integration also offers an update
 * stream that re-reads the task list every `sync_interval` seconds and only
 * produces a new snapshot when the listing changed.
 */

import { z } from 'zod';
import { StreamingNotSupportedError, sleep, withRetry } from '../../utils/errors.js';
import { escapeHtml } from '../../utils/html.js';
import { BaseIntegration, type IntegrationMeta, type IntegrationOptions } from '../BaseIntegration.js';
import { TodoistClient, type TodoistTask } from './TodoistClient.js';

export const TodoistConfigSchema = z
  .object({
    api_token: z.string().min(1),
    max_tasks: z.number().int().positive().default(10),
    sync_interval: z.number().positive().default(15),
    use_sync: z.boolean().default(true)
  })
  .passthrough();

export type TodoistConfig = z.infer<typeof TodoistConfigSchema>;

export interface TodoistTaskView {
  id: string;
  content: string;
  description: string;
  priority: number;
  labels: string[];
  projectId: string;
  projectName: string;
  due: {
    date: string;
    string: string | null;
    isRecurring: boolean;
    timezone: string | null;
  } | null;
}

export interface TodoistData {
  todayTasks: TodoistTaskView[];
  overdueTasks: TodoistTaskView[];
  upcomingCount: number;
  completedToday: number;
  totalTasks: number;
  projectsCount: number;
  maxTasks: number;
  timestamp: string;
}

/** The client calls the integration depends on */
export type TodoistApi = Pick<TodoistClient, 'getTasks' | 'getProjects'>;

export interface TodoistIntegrationOptions extends IntegrationOptions {
  client?: TodoistApi;
  now?: () => Date;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function localDateKey(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

function toView(task: TodoistTask, projectNames: Map<string, string>): TodoistTaskView {
  return {
    id: task.id,
    content: task.content,
    description: task.description ?? '',
    priority: task.priority,
    labels: task.labels,
    projectId: task.projectId,
    projectName: projectNames.get(task.projectId) ?? '',
    due: task.due
      ? {
          date: task.due.date,
          string: task.due.string ?? null,
          isRecurring: task.due.isRecurring,
          timezone: task.due.timezone ?? null
        }
      : null
  };
}

const byPriorityDesc = (a: TodoistTaskView, b: TodoistTaskView): number => b.priority - a.priority;

/**
 * Everything but the timestamp, for change detection
 */
export function fingerprintOf(data: TodoistData): string {
  return JSON.stringify({ ...data, timestamp: null });
}

export class TodoistIntegration extends BaseIntegration<TodoistConfig, TodoistData> {
  static readonly meta: IntegrationMeta = {
    name: 'todoist',
    displayName: 'Todoist',
    refreshInterval: 60
  };

  private readonly client: TodoistApi;
  private readonly now: () => Date;

  constructor(credentials: Record<string, unknown>, options: TodoistIntegrationOptions = {}) {
    super(TodoistIntegration.meta, TodoistConfigSchema, credentials, {
      ...options,
      secretFields: ['api_token']
    });
    this.client = options.client ?? new TodoistClient({ apiToken: this.config.api_token });
    this.now = options.now ?? (() => new Date());
  }

  async fetchData(): Promise<TodoistData> {
    const [tasks, projects] = await Promise.all([this.client.getTasks(), this.client.getProjects()]);
    const projectNames = new Map(projects.map(project => [project.id, project.name]));
    const today = localDateKey(this.now());

    const todayTasks: TodoistTaskView[] = [];
    const overdueTasks: TodoistTaskView[] = [];
    let upcomingCount = 0;

    for (const task of tasks) {
      const view = toView(task, projectNames);
      // Due dates may carry a time part; only the calendar day matters
      const dueDay = view.due?.date.slice(0, 10);

      if (!dueDay) {
        upcomingCount++;
      } else if (dueDay < today) {
        overdueTasks.push(view);
      } else if (dueDay === today) {
        todayTasks.push(view);
      } else {
        upcomingCount++;
      }
    }

    todayTasks.sort(byPriorityDesc);
    overdueTasks.sort(byPriorityDesc);

    return {
      todayTasks,
      overdueTasks,
      upcomingCount,
      completedToday: 0,
      totalTasks: tasks.length,
      projectsCount: projects.length,
      maxTasks: this.config.max_tasks,
      timestamp: this.now().toISOString()
    };
  }

  override openUpdateStream(signal: AbortSignal): AsyncIterable<TodoistData> {
    if (!this.config.use_sync) {
      throw new StreamingNotSupportedError(this.id);
    }
    return this.watchChanges(signal);
  }

  private async *watchChanges(signal: AbortSignal): AsyncGenerator<TodoistData> {
    const initial = await withRetry(() => this.fetchData(), {
      maxRetries: 2,
      initialDelayMs: 1000,
      signal
    });
    let fingerprint = fingerprintOf(initial);
    yield initial;

    while (!signal.aborted) {
      let data: TodoistData | null = null;
      try {
        await sleep(this.config.sync_interval * 1000, signal);
        const latest = await this.fetchData();
        const next = fingerprintOf(latest);
        if (next !== fingerprint) {
          this.logger.debug('Task list changed');
          fingerprint = next;
          data = latest;
        }
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        this.logger.warn('Change check failed; retrying next interval', error);
      }

      if (data) {
        yield data;
      }
    }
  }

  renderWidget(data: TodoistData): string {
    const renderTask = (task: TodoistTaskView, overdue: boolean): string => {
      const labels = task.labels
        .map(label => `<span class="task-label">${escapeHtml(label)}</span>`)
        .join('');
      const due = task.due?.string ? `<span class="task-due">${escapeHtml(task.due.string)}</span>` : '';
      return `<li class="task priority-${task.priority}${overdue ? ' overdue' : ''}">` +
        `<span class="task-content">${escapeHtml(task.content)}</span>` +
        (task.projectName ? `<span class="task-project">${escapeHtml(task.projectName)}</span>` : '') +
        due + labels + '</li>';
    };

    const overdue = data.overdueTasks.slice(0, data.maxTasks);
    const remaining = Math.max(0, data.maxTasks - overdue.length);
    const today = data.todayTasks.slice(0, remaining);

    const items = [
      ...overdue.map(task => renderTask(task, true)),
      ...today.map(task => renderTask(task, false))
    ];

    const list = items.length > 0
      ? `<ul class="task-list">${items.join('')}</ul>`
      : '<p class="empty">Nothing due today</p>';

    return `<div class="todoist-widget">
  <div class="task-summary">
    <span class="count overdue-count">${data.overdueTasks.length} overdue</span>
    <span class="count today-count">${data.todayTasks.length} today</span>
    <span class="count upcoming-count">${data.upcomingCount} upcoming</span>
  </div>
  ${list}
</div>`;
  }
}
