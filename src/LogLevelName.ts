import type { LogLevelNameSchema } from "./LogLevelNameSchema";
import type { z } from "zod";

export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
