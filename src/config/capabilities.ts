// ── Process capabilities ─────────────────────────────────────
// Detected once at startup and injected into the runner; nothing
// downstream reads the environment for these.

export interface Capabilities {
  /** A display server is reachable, so headed browsers can open windows. */
  displayAvailable: boolean;
  platform: NodeJS.Platform;
}

export function detectCapabilities(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Capabilities {
  if (platform !== 'linux') {
    return { displayAvailable: true, platform };
  }

  const displayAvailable = Boolean(env['DISPLAY'] || env['WAYLAND_DISPLAY']);
  return { displayAvailable, platform };
}
