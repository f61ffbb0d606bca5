// ---------------------------------------------------------------------------
// Configuration loader
// ---------------------------------------------------------------------------
//
// config.json keeps the snake_case keys operators already write:
//
//   {
//     "sync_jobs": [
//       { "name": "photos", "source": "/mnt/nas/photos/",
//         "destination": "backup@host:/srv/photos/", "exclude": ["*.tmp"] }
//     ],
//     "settings": {
//       "ssh_key": "/opt/backup-mirror/.ssh/backup_key",
//       "rsync_options": "-avz --delete --stats",
//       "notification": { "smtp_server": "smtp.example.com", "smtp_port": 587,
//                         "smtp_user": "...", "smtp_pass": "...",
//                         "email": "ops@example.com" }
//     }
//   }
//
// It is validated once and turned into the camelCase records below. Unknown
// keys are rejected so a misspelled setting fails the load instead of being
// silently ignored.
// ---------------------------------------------------------------------------

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigLoadError, errorMessage } from "./errors.js";
import {
  DEFAULT_RSYNC_OPTIONS,
  RSYNC_OPTIONS,
  type RsyncOptionsSpec,
} from "./rsync-options.js";

const nonEmpty = z.string().trim().min(1);

const jobSchema = z
  .object({
    name: nonEmpty,
    source: nonEmpty,
    destination: nonEmpty,
    exclude: z.array(nonEmpty).default([]),
    enabled: z.boolean().default(true),
  })
  .strict();

const notificationSchema = z
  .object({
    smtp_server: nonEmpty.optional(),
    smtp_port: z.number().int().positive().max(65535).default(587),
    smtp_user: nonEmpty.optional(),
    smtp_pass: z.string().min(1).optional(),
    email: z.string().email().optional(),
  })
  .strict()
  .superRefine((n, ctx) => {
    if (!n.email) return;
    for (const key of ["smtp_server", "smtp_user", "smtp_pass"] as const) {
      if (!n[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when email is set`,
        });
      }
    }
  });

const settingsSchema = z
  .object({
    ssh_key: nonEmpty.optional(),
    rsync_options: z
      .union([z.string(), z.array(z.enum(RSYNC_OPTIONS))])
      .default(DEFAULT_RSYNC_OPTIONS),
    rsync_path: nonEmpty.default("rsync"),
    notification: notificationSchema.optional(),
    // read by the dashboard only
    web_interface: z
      .object({
        title: z.string().optional(),
        port: z.number().int().positive().max(65535).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    sync_jobs: z.array(jobSchema),
    settings: settingsSchema.default({}),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.sync_jobs.forEach((job, idx) => {
      if (seen.has(job.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sync_jobs", idx, "name"],
          message: `duplicate job name "${job.name}"`,
        });
      }
      seen.add(job.name);
    });
  });

export interface JobSpec {
  name: string;
  source: string;
  destination: string;
  exclude: string[];
  enabled: boolean;
}

export interface NotificationSettings {
  smtpServer?: string;
  smtpPort: number;
  smtpUser?: string;
  smtpPass?: string;
  email?: string;
}

export interface MirrorSettings {
  sshKey?: string;
  rsyncOptions: RsyncOptionsSpec;
  rsyncPath: string;
  notification?: NotificationSettings;
}

export interface MirrorConfig {
  jobs: JobSpec[];
  settings: MirrorSettings;
}

export const DEFAULT_SETTINGS: MirrorSettings = {
  rsyncOptions: DEFAULT_RSYNC_OPTIONS,
  rsyncPath: "rsync",
};

function toMirrorConfig(file: z.infer<typeof configFileSchema>): MirrorConfig {
  const { settings } = file;
  const n = settings.notification;
  return {
    jobs: file.sync_jobs.map((job) => ({ ...job })),
    settings: {
      sshKey: settings.ssh_key,
      rsyncOptions: settings.rsync_options,
      rsyncPath: settings.rsync_path,
      notification: n
        ? {
            smtpServer: n.smtp_server,
            smtpPort: n.smtp_port,
            smtpUser: n.smtp_user,
            smtpPass: n.smtp_pass,
            email: n.email,
          }
        : undefined,
    },
  };
}

/** Validate an already-decoded config object. */
export function parseConfig(raw: unknown, source = "config"): MirrorConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigLoadError(`Configuration ${source} invalid:\n${issues}`, {
      source,
      issues: result.error.issues.length,
    });
  }
  return toMirrorConfig(result.data);
}

/**
 * Read and validate the JSON config file.
 * Throws ConfigLoadError when the file is missing, not JSON, or invalid.
 */
export async function loadConfig(file: string): Promise<MirrorConfig> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read configuration ${file}: ${errorMessage(err)}`,
      { file },
      { cause: err },
    );
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigLoadError(
      `Configuration ${file} is not valid JSON: ${errorMessage(err)}`,
      { file },
      { cause: err },
    );
  }
  return parseConfig(raw, file);
}
