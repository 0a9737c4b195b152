import { z } from "zod";

const ControllerEnvSchema = z.object({
  UNIFI_HOST: z.string().url().optional(),
  UNIFI_SITE: z.string().min(1).default("default"),
  UNIFI_SESSION_COOKIE: z.string().min(1).optional(),
  UNIFI_CSRF_TOKEN: z.string().min(1).optional()
});

export interface ControllerSettings {
  host: string;
  site: string;
  sessionCookie: string;
  csrfToken?: string;
}

export interface ControllerOverrides {
  host?: string;
  site?: string;
}

/** Flags win over the environment. The session itself is established elsewhere. */
export function resolveControllerSettings(
  env: NodeJS.ProcessEnv,
  overrides: ControllerOverrides = {}
): ControllerSettings {
  const parsed = ControllerEnvSchema.parse(env);
  const host = overrides.host ?? parsed.UNIFI_HOST;
  if (!host) {
    throw new Error("Controller host is required (--host or UNIFI_HOST)");
  }
  if (!parsed.UNIFI_SESSION_COOKIE) {
    throw new Error("UNIFI_SESSION_COOKIE is not set in the environment.");
  }
  return {
    host,
    site: overrides.site ?? parsed.UNIFI_SITE,
    sessionCookie: parsed.UNIFI_SESSION_COOKIE,
    csrfToken: parsed.UNIFI_CSRF_TOKEN
  };
}
