import { format } from "util";

export function formatLogLine(levelName: string, args: unknown[], now: Date = new Date()): string {
    return `[${now.toISOString()}] [${levelName}] ${format(...args)}`;
}
