export enum SchedulerKind {
    CRON = 'cron',
    SYSTEMD = 'systemd',
}

export function parseSchedulerKind(value: string | null | undefined): SchedulerKind | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === SchedulerKind.CRON) return SchedulerKind.CRON;
    if (normalized === SchedulerKind.SYSTEMD) return SchedulerKind.SYSTEMD;
    return null;
}

export function otherScheduler(kind: SchedulerKind): SchedulerKind {
    return kind === SchedulerKind.CRON ? SchedulerKind.SYSTEMD : SchedulerKind.CRON;
}
