import { LogLevelNameSchema } from "./LogLevelNameSchema";
import { z } from "zod";

export const ConfigFileSchema = z
    .object({
        name: z.string().optional(),
        interfaces: z.union([z.string(), z.array(z.string())]).optional(),
        pollInterval: z.number().positive().optional(),
        logging: z
            .object({
                level: LogLevelNameSchema.optional(),
                file: z.string().optional()
            })
            .strict()
            .optional()
    })
    .strict();
