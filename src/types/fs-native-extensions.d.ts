// fs-native-extensions ships no type declarations; only the calls used here.
declare module "fs-native-extensions" {
  interface LockOptions {
    /** Take a shared lock instead of an exclusive one */
    shared?: boolean;
  }

  interface FsNativeExtensions {
    /** Waits until the whole file is locked */
    waitForLock(fd: number, options?: LockOptions): Promise<void>;
    unlock(fd: number): void;
  }

  const fsNativeExtensions: FsNativeExtensions;
  export = fsNativeExtensions;
}
