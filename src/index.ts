import { Hono } from 'hono';
import { GitHubService } from './services/github.service';
import { DataSourceError } from './services/errors';
import type { ActivitySummary, ProfileSummary } from './services/types';

export interface ActivitySource {
  getActivity(username: string, today: Date): Promise<ActivitySummary>;
  getProfile(username: string, today: Date): Promise<ProfileSummary>;
}

export interface AppOptions {
  githubToken: string;
  includePrivateRepos?: boolean;
  cacheMaxAge?: number;
  now?: () => Date;
  createSource?: () => ActivitySource;
}

type Variables = {
  activitySource: ActivitySource;
};

const DEFAULT_CACHE_MAX_AGE = 43200;

function describeFailure(error: unknown): { message: string; status: 500 | 502 } {
  console.error('❌ Request failed:', error);
  if (error instanceof DataSourceError) {
    return { message: 'Failed to fetch activity from GitHub', status: 502 };
  }
  return { message: 'Failed to compute activity stats', status: 500 };
}

export function createApp(options: AppOptions) {
  const now = options.now ?? (() => new Date());
  const cacheControl = `public, max-age=${options.cacheMaxAge ?? DEFAULT_CACHE_MAX_AGE}`;
  const createSource =
    options.createSource ??
    (() =>
      new GitHubService(options.githubToken, {
        includePrivateRepos: options.includePrivateRepos,
      }));

  const app = new Hono<{ Variables: Variables }>();

  app.use('*', async (c, next) => {
    c.set('activitySource', createSource());
    await next();
  });

  app.get('/', (c) => {
    return c.html(`
    <html>
      <head>
        <title>GitHub Activity Stats</title>
        <style>
          body { font-family: system-ui, -apple-system, sans-serif; max-width: 800px; margin: 0 auto; padding: 2rem; }
          pre { background: #f5f5f5; padding: 1rem; border-radius: 4px; }
        </style>
      </head>
      <body>
        <h1>📈 GitHub Activity Stats</h1>
        <p>Contribution streaks, best day and totals for any GitHub user.</p>
        <h2>Usage</h2>
        <pre>GET ${c.req.url}activity/YOUR_GITHUB_USERNAME</pre>
        <pre>GET ${c.req.url}profile/YOUR_GITHUB_USERNAME</pre>
      </body>
    </html>
  `);
  });

  app.get('/activity/:username', async (c) => {
    try {
      const username = c.req.param('username');
      const activity = await c.get('activitySource').getActivity(username, now());
      c.header('Cache-Control', cacheControl);
      return c.json(activity);
    } catch (error) {
      const { message, status } = describeFailure(error);
      return c.json({ error: message }, status);
    }
  });

  app.get('/profile/:username', async (c) => {
    try {
      const username = c.req.param('username');
      const profile = await c.get('activitySource').getProfile(username, now());
      c.header('Cache-Control', cacheControl);
      return c.json(profile);
    } catch (error) {
      const { message, status } = describeFailure(error);
      return c.json({ error: message }, status);
    }
  });

  return app;
}
