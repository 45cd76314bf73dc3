import type { Express } from 'express';
import type { DashboardStats, UserRecord } from '../../src/users/user.types';

export const alice: UserRecord = {
  email: 'alice@example.com',
  email_verified: true,
  two_factor_enabled: false,
  metadata: {},
  created_at: '2024-01-01T00:00:00',
  updated_at: '2024-01-02T00:00:00'
};

export const bob: UserRecord = {
  email: 'bob@example.com',
  email_verified: false,
  two_factor_enabled: true,
  metadata: { team: 'ops' },
  created_at: '2024-01-03T00:00:00',
  updated_at: '2024-01-03T00:00:00'
};

export const stats: DashboardStats = {
  total_users: 2,
  verified_users: 1,
  unverified_users: 1,
  two_factor_enabled: 1
};

/** Auth module routes over a fixed user list; writes are answered but not stored. */
export function userRoutes(app: Express): void {
  const users = [alice, bob];
  const find = (email: string) => users.find((u) => u.email === email);

  app.get('/users', (_req, res) => {
    res.json(users);
  });

  app.post('/users', (req, res) => {
    if (find(req.body.email)) {
      res.status(409).json({ detail: 'User already exists' });
      return;
    }
    res.status(201).json({ ...req.body, created_at: '2024-02-01T00:00:00' });
  });

  app.get('/users/:email', (req, res) => {
    const user = find(req.params.email);
    if (!user) {
      res.status(404).json({ detail: 'User not found' });
      return;
    }
    res.json(user);
  });

  app.put('/users/:email', (req, res) => {
    const user = find(req.params.email);
    if (!user) {
      res.status(404).json({ detail: 'User not found' });
      return;
    }
    res.json({ ...user, ...req.body });
  });

  app.delete('/users/:email', (req, res) => {
    if (!find(req.params.email)) {
      res.status(404).json({ detail: 'User not found' });
      return;
    }
    res.status(204).send();
  });

  app.get('/stats', (_req, res) => {
    res.json(stats);
  });
}
