import { z, type ZodIssue } from "zod";

export const UntrackedComponentPolicySchema = z.enum(["error", "warn"]);

export type UntrackedComponentPolicy = z.infer<typeof UntrackedComponentPolicySchema>;

export const StationConfigSchema = z
  .object({
    untracked_components: UntrackedComponentPolicySchema.default("error"),
    verbose: z.boolean().default(true),
  })
  .strict();

export const InstrumentConfigSchema = z
  .object({
    name: z.string().min(1),
    label: z.string().optional(),
  })
  .strict();

export const ParameterConfigSchema = z
  .object({
    name: z.string().min(1),
    label: z.string().optional(),
    unit: z.string().default(""),
    must_differ: z.boolean().default(true),
    strict: z.boolean().default(true),
  })
  .strict();

export const RigConfigSchema = z
  .object({
    station: StationConfigSchema.default({}),
    instruments: z.array(InstrumentConfigSchema).default([]),
    parameters: z.array(ParameterConfigSchema).default([]),
    profiles: z.record(z.string().min(1), z.array(z.string().min(1))).default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const names = new Set<string>();
    const entries = [
      ...config.instruments.map((item, index) => ({ name: item.name, path: ["instruments", index, "name"] })),
      ...config.parameters.map((item, index) => ({ name: item.name, path: ["parameters", index, "name"] })),
    ];

    for (const entry of entries) {
      if (names.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: entry.path,
          message: `Duplicate component name "${entry.name}"`,
        });
      }
      names.add(entry.name);
    }

    for (const [profile, members] of Object.entries(config.profiles)) {
      members.forEach((member, index) => {
        if (!names.has(member)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["profiles", profile, index],
            message: `Unknown component "${member}"`,
          });
        }
      });
    }
  });

export type RigConfig = z.infer<typeof RigConfigSchema>;
export type InstrumentConfig = z.infer<typeof InstrumentConfigSchema>;
export type ParameterConfig = z.infer<typeof ParameterConfigSchema>;

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
