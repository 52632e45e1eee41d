/**
 * Credential forwarding facade.
 */

export { CredentialForwarder, type CredentialBundle, type CredentialForwarderOptions } from "./forwarder.js";
export { resolveSshKey, registerKey, keyReferenceToPath, type ResolvedKey, type KeySource } from "./keys.js";
export { copyGitIdentity, ensureConfigDir } from "./git-identity.js";
export {
  HostSocketStrategy,
  VmSocketStrategy,
  selectForwardStrategy,
  type CredentialForwardStrategy,
  type ForwardedAgent,
} from "./strategies.js";
