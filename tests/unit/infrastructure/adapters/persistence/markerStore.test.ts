import { FileSystemMock } from '@mocks/infrastructure/filesystem/fs.mock';
import { FileMarkerStore } from '@/infrastructure/adapters/persistence/markerStore';
import { buildRenewalConfig, renewalFiles } from '@/config/renewalConfig';
import { SchedulerKind } from '@/domain/enums/scheduler';
import { TEST_ENV, TEST_NOW } from '@helpers/config-builders';

describe('FileMarkerStore', () => {
  const files = renewalFiles(buildRenewalConfig(TEST_ENV).paths);
  let fs: FileSystemMock;
  let store: FileMarkerStore;

  beforeEach(() => {
    fs = new FileSystemMock(() => TEST_NOW);
    store = new FileMarkerStore(fs, files);
  });

  it('should read no roles when nothing was written', async () => {
    expect(await store.readMarkers()).toEqual({ primary: null, fallback: null, failedPrimary: null });
  });

  it('should write one scheduler kind per marker', async () => {
    await store.writeRoles(SchedulerKind.CRON, SchedulerKind.SYSTEMD);

    expect(fs.content('/var/lib/tak-renewal-primary')).toBe('cron\n');
    expect(fs.content('/var/lib/tak-renewal-fallback')).toBe('systemd\n');
    expect(await store.readMarkers()).toEqual({
      primary: SchedulerKind.CRON,
      fallback: SchedulerKind.SYSTEMD,
      failedPrimary: null,
    });
  });

  it('should remove the fallback marker when there is no fallback', async () => {
    await store.writeRoles(SchedulerKind.CRON, SchedulerKind.SYSTEMD);
    await store.writeRoles(SchedulerKind.SYSTEMD, null);

    expect(fs.content('/var/lib/tak-renewal-fallback')).toBeUndefined();
    expect((await store.readMarkers()).primary).toBe(SchedulerKind.SYSTEMD);
  });

  it('should ignore markers holding a role name instead of a scheduler', async () => {
    fs.addFile(files.primaryMarker, 'primary\n');

    expect((await store.readMarkers()).primary).toBeNull();
  });

  it('should record the failed primary', async () => {
    await store.recordFailedPrimary(SchedulerKind.CRON);

    expect((await store.readMarkers()).failedPrimary).toBe(SchedulerKind.CRON);
  });

  it('should append history and return the latest entries', async () => {
    await store.appendHistory(SchedulerKind.CRON, SchedulerKind.SYSTEMD, new Date('2024-06-01T02:00:00.000Z'));
    await store.appendHistory(SchedulerKind.SYSTEMD, SchedulerKind.CRON, new Date('2024-06-08T02:00:00.000Z'));
    await store.appendHistory(SchedulerKind.CRON, SchedulerKind.SYSTEMD, new Date('2024-06-15T02:00:00.000Z'));

    expect(await store.readHistory(2)).toEqual([
      '2024-06-08T02:00:00.000Z: systemd -> cron',
      '2024-06-15T02:00:00.000Z: cron -> systemd',
    ]);
  });

  it('should clear every marker and the history', async () => {
    await store.writeRoles(SchedulerKind.CRON, SchedulerKind.SYSTEMD);
    await store.recordFailedPrimary(SchedulerKind.SYSTEMD);
    await store.appendHistory(SchedulerKind.SYSTEMD, SchedulerKind.CRON, TEST_NOW);

    await store.clear();

    expect(fs.files.size).toBe(0);
    expect(await store.readHistory(5)).toEqual([]);
  });
});
