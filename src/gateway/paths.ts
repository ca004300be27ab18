/**
 * Vault API path helpers
 */

/**
 * Join path parts into an API path, URL-encoding every segment
 *
 * @example
 * vaultPath('sys/mounts', 'team/kv', 'tune') // 'sys/mounts/team/kv/tune'
 */
export function vaultPath(...parts: string[]): string {
  return parts
    .flatMap(part => part.split('/'))
    .filter(Boolean)
    .map(segment => encodeURIComponent(segment))
    .join('/')
}

/**
 * Split an identity scoped to a secrets engine into the mount and the path
 * below it. The mount is the longest known mount prefixing the identity, or
 * the first segment when none does.
 */
export function splitMount(identity: string, knownMounts: Iterable<string> = []): { mount: string; path: string } {
  let best = ''
  for (const mount of knownMounts) {
    if (identity.startsWith(`${mount}/`) && mount.length > best.length) {
      best = mount
    }
  }
  if (!best) {
    const slash = identity.indexOf('/')
    best = slash === -1 ? identity : identity.slice(0, slash)
  }
  return { mount: best, path: identity.slice(best.length + 1) }
}
