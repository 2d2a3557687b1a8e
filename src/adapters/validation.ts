import { z } from "zod";

/**
 * Validation schemas for the bootstrap YAML and for wizard input.
 */

const nonEmpty = (label: string) => z.string().min(1, `${label} is required`);

export const ConfigDefaultSchema = z.object({
  key: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "keys must be identifiers"),
  value: z.string().default(""),
  comment: z.string().optional(),
  secret: z.boolean().optional(),
});

export const BootstrapFileSchema = z.object({
  envFile: nonEmpty("envFile").default(".env"),
  directories: z.array(z.string()).default([]),
  runtime: z.object({
    command: nonEmpty("runtime.command"),
    versionArgs: z.array(z.string()).default(["--version"]),
    minVersion: z.string().regex(/^\d+(\.\d+){0,2}$/, "runtime.minVersion must look like 3.9"),
    installer: z.object({
      url: z.string().url(),
      fileName: nonEmpty("runtime.installer.fileName"),
      command: nonEmpty("runtime.installer.command"),
      args: z.array(z.string()).default([]),
    }),
  }),
  environment: z.object({
    path: nonEmpty("environment.path"),
    packages: z.array(z.string()).default([]),
  }),
  email: z
    .object({
      probeTimeoutMs: z.number().int().positive().default(10000),
    })
    .default({}),
  service: z.object({
    command: nonEmpty("service.command"),
    args: z.array(z.string()).default([]),
    logFile: nonEmpty("service.logFile"),
    defaultPort: z.number().int().min(1).max(65535).default(5000),
  }),
  defaults: z.array(ConfigDefaultSchema).min(1, "defaults must list at least one key"),
});

export type BootstrapFile = z.infer<typeof BootstrapFileSchema>;

export const EmailSettingsSchema = z.object({
  EMAIL_HOST: z.string().min(1, "Host is required"),
  EMAIL_PORT: z
    .string()
    .regex(/^\d+$/, "Port must be a number")
    .refine((p) => Number(p) >= 1 && Number(p) <= 65535, "Port must be between 1 and 65535"),
  EMAIL_USERNAME: z.string().email("Username must be an email address"),
  EMAIL_PASSWORD: z.string(),
  EMAIL_RECIPIENT: z.string().refine((val) => {
    if (!val) return true;
    const emails = val.split(",").map((e) => e.trim());
    const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    return emails.every((email) => emailRegex.test(email));
  }, "Invalid email address format"),
});

export type EmailSettings = z.infer<typeof EmailSettingsSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
