export type BrowserHook = (url: string) => Promise<void>;

/** macOS, Windows, or Linux with a display server. */
export function isDesktopPlatform(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (platform === "darwin" || platform === "win32") return true;
  if (platform === "linux") return Boolean(env.DISPLAY || env.WAYLAND_DISPLAY);
  return false;
}

export async function openInBrowser(url: string): Promise<void> {
  const open = (await import("open")).default;
  await open(url);
}

/** Optional hook: undefined when disabled or not on a desktop. */
export function browserHook(
  enabled: boolean,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): BrowserHook | undefined {
  return enabled && isDesktopPlatform(platform, env) ? openInBrowser : undefined;
}
