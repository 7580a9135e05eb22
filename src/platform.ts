/**
 * Host platform helpers: numeric identity for in-container file ownership
 * and the host port probe.
 */

import { connect } from "node:net";
import { platform } from "node:os";

import { PORT_PROBE_HOST, WINDOWS_DEFAULT_GID, WINDOWS_DEFAULT_UID } from "./constants.js";

/** Host platform and current numeric user/group, when the platform has them. */
export interface HostIdentity {
  platform: NodeJS.Platform;
  uid?: number;
  gid?: number;
}

export function getHostIdentity(): HostIdentity {
  return {
    platform: platform(),
    uid: process.getuid?.(),
    gid: process.getgid?.(),
  };
}

/**
 * Resolve the UID/GID for the container user.
 *
 * - Windows: 999 / 0 (no native UID/GID)
 * - Linux/macOS: the current user's UID and primary GID
 *
 * Explicit values always win.
 */
export function getUidGid(
  uid?: number,
  gid?: number,
  host: HostIdentity = getHostIdentity()
): [number, number] {
  if (host.platform === "win32") {
    return [uid ?? WINDOWS_DEFAULT_UID, gid ?? WINDOWS_DEFAULT_GID];
  }
  return [uid ?? host.uid ?? WINDOWS_DEFAULT_UID, gid ?? host.gid ?? WINDOWS_DEFAULT_GID];
}

/** Resolves true when something on the host accepts connections on `port`. */
export type PortProbe = (port: number) => Promise<boolean>;

/**
 * Check whether a TCP port on the host is already bound by trying to
 * connect to it.
 */
export function isPortInUse(port: number, host = PORT_PROBE_HOST): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({ port, host });
    socket.once("connect", () => {
      socket.destroy();
      resolve(true);
    });
    socket.once("error", () => {
      socket.destroy();
      resolve(false);
    });
  });
}
