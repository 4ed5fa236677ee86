import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader } from './ConfigLoader.js';
import { ConfigurationError } from '../utils/errors.js';

const CONFIG = `
[dashboard]
title = "Test Dashboard"
theme = "neon"

[layout]
columns = 4

[[layout.widgets]]
integration = "system"
position = { row = 0, col = 1, width = 2 }

[[layout.widgets]]
integration = "todoist"
enabled = false

[[layout.widgets]]
note = "spacer"
`;

const CREDENTIALS = `
[todoist]
api_token = "test-token"
max_tasks = 5

[unifi_protect]
host = "https://nvr.local"
username = "viewer"
password = "test-password"
`;

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dashboard-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, contents: string): void {
    fs.writeFileSync(path.join(dir, name), contents);
  }

  describe('loadConfig', () => {
    it('should throw when config.toml is missing', () => {
      const loader = new ConfigLoader(dir, {});

      expect(() => loader.loadConfig()).toThrow(ConfigurationError);
      expect(() => loader.loadConfig()).toThrow(`Config file not found: ${path.join(dir, 'config.toml')}`);
    });

    it('should apply defaults to an empty file', () => {
      write('config.toml', '');
      const loader = new ConfigLoader(dir, {});

      expect(loader.getDashboardConfig()).toEqual({
        title: 'Home Dashboard',
        theme: 'industrial',
        refresh_interval: 30
      });
      expect(loader.getLayoutConfig()).toEqual({ columns: 3, widgets: [] });
    });

    it('should read dashboard, layout and widgets', () => {
      write('config.toml', CONFIG);
      const loader = new ConfigLoader(dir, {});

      expect(loader.getDashboardConfig().title).toBe('Test Dashboard');
      expect(loader.getDashboardConfig().theme).toBe('neon');
      expect(loader.getLayoutConfig().columns).toBe(4);

      const widgets = loader.getWidgetConfigs();
      expect(widgets).toHaveLength(3);
      expect(widgets[0]).toEqual({
        integration: 'system',
        enabled: true,
        position: { row: 0, col: 1, width: 2 }
      });
      expect(widgets[1]?.enabled).toBe(false);
      expect(widgets[2]).toEqual({ note: 'spacer', enabled: true, position: {} });
    });

    it('should report TOML syntax errors with the file name', () => {
      write('config.toml', '[dashboard\ntitle = 1');
      const loader = new ConfigLoader(dir, {});

      expect(() => loader.loadConfig()).toThrow(/^Failed to parse config\.toml: /);
    });

    it('should report schema violations with their path', () => {
      write('config.toml', '[layout]\ncolumns = "wide"');
      const loader = new ConfigLoader(dir, {});

      expect(() => loader.loadConfig()).toThrow('Invalid config.toml: layout.columns: Expected number, received string');
    });

    it('should cache until reload', () => {
      write('config.toml', CONFIG);
      const loader = new ConfigLoader(dir, {});
      expect(loader.getDashboardConfig().title).toBe('Test Dashboard');

      write('config.toml', '[dashboard]\ntitle = "Changed"');
      expect(loader.getDashboardConfig().title).toBe('Test Dashboard');

      loader.reload();
      expect(loader.getDashboardConfig().title).toBe('Changed');
    });

    it('should return copies of the widget list', () => {
      write('config.toml', CONFIG);
      const loader = new ConfigLoader(dir, {});

      loader.getWidgetConfigs().pop();

      expect(loader.getWidgetConfigs()).toHaveLength(3);
    });
  });

  describe('credentials', () => {
    it('should return empty credentials when the file is missing', () => {
      const loader = new ConfigLoader(dir, {});

      expect(loader.loadCredentials()).toEqual({});
      expect(loader.getIntegrationCredentials('todoist')).toEqual({});
    });

    it('should return one integration table', () => {
      write('credentials.toml', CREDENTIALS);
      const loader = new ConfigLoader(dir, {});

      expect(loader.getIntegrationCredentials('todoist')).toEqual({ api_token: 'test-token', max_tasks: 5 });
    });

    it('should let environment variables override secrets', () => {
      write('credentials.toml', CREDENTIALS);
      const loader = new ConfigLoader(dir, {
        TODOIST_API_TOKEN: 'env-token',
        UNIFI_PROTECT_PASSWORD: 'env-password'
      });

      expect(loader.getIntegrationCredentials('todoist').api_token).toBe('env-token');
      expect(loader.getIntegrationCredentials('unifi_protect')).toEqual({
        host: 'https://nvr.local',
        username: 'viewer',
        password: 'env-password'
      });
    });

    it('should create a table for an override without a file entry', () => {
      const loader = new ConfigLoader(dir, { TODOIST_API_TOKEN: 'env-token' });

      expect(loader.getIntegrationCredentials('todoist')).toEqual({ api_token: 'env-token' });
    });

    it('should hand out copies that do not leak mutations', () => {
      write('credentials.toml', CREDENTIALS);
      const loader = new ConfigLoader(dir, {});

      loader.getIntegrationCredentials('todoist').api_token = 'mutated';

      expect(loader.getIntegrationCredentials('todoist').api_token).toBe('test-token');
    });
  });
});
