import os from "node:os";

export type RuntimeInfo = {
  platform: string;
  release: string;
  arch: string;
  nodeVersion: string;
};

export function currentRuntimeInfo(): RuntimeInfo {
  return {
    platform: os.type(),
    release: os.release(),
    arch: os.arch(),
    nodeVersion: process.versions.node,
  };
}
