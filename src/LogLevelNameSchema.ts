import { z } from "zod";

export const LogLevelNameSchema = z.enum(["silent", "error", "warn", "log", "debug", "verbose"]);
