import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SessionJanitorService } from './session-janitor.service';
import { SessionService } from './session.service';
import { SessionError } from './session.errors';
import { SessionMap, SessionStore } from './session-store';

class ReadOnlyStore extends SessionStore {
  async save(_sessions: SessionMap): Promise<void> {
    throw new SessionError('disk full');
  }
}

describe('SessionJanitorService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-janitor-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('purges expired sessions on each run', async () => {
    let clock = 1_700_000_000_000;
    const sessions = new SessionService(
      { secret: 'test-secret', ttlSeconds: 60, now: () => clock },
      new SessionStore(path.join(dir, 'sessions.json')),
      { verify: async () => true },
    );
    const janitor = new SessionJanitorService(sessions);
    await sessions.login('alice', 'test-password');
    await sessions.login('bob', 'test-password');

    expect(await janitor.purgeExpired()).toBe(0);
    clock += 60_000;
    expect(await janitor.purgeExpired()).toBe(2);
  });

  it('reports zero when the store cannot be written', async () => {
    const filePath = path.join(dir, 'sessions.json');
    await fs.writeFile(
      filePath,
      JSON.stringify({ tok: { user_id: 'alice', created_at: 'x', expires_at: 0 } }),
      'utf8',
    );
    const sessions = new SessionService(
      { secret: 'test-secret', ttlSeconds: 60 },
      new ReadOnlyStore(filePath),
      { verify: async () => true },
    );

    expect(await new SessionJanitorService(sessions).purgeExpired()).toBe(0);
  });
});
