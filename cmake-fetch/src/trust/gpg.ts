import { execFile } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export type ExecResult = { stdout: string; stderr: string };

/** Runs a program; rejects on non-zero exit with stdout/stderr attached to the error. */
export type ExecFn = (file: string, args: string[], opts: { timeout: number }) => Promise<ExecResult>;

export type VerifyOutcome = {
  valid: boolean;
  /** Combined tool output, for verbose diagnostics only. */
  output: string;
};

/** Detached-signature checking, keyring based. */
export interface SignatureVerifier {
  /** Build a keyring file holding exactly the given ASCII-armored public keys. */
  importKeys(keyFiles: string[], keyringPath: string): Promise<void>;
  /** Check `dataPath` against `signaturePath`; `keyringPath` null means the default keyring. */
  verify(signaturePath: string, dataPath: string, keyringPath: string | null): Promise<VerifyOutcome>;
}

const defaultExec: ExecFn = async (file, args, opts) => {
  const { stdout, stderr } = await pExecFile(file, args, { timeout: opts.timeout, encoding: "utf8" });
  return { stdout, stderr };
};

function outputOf(e: unknown): string {
  if (typeof e !== "object" || e === null) return String(e);
  const parts: string[] = [];
  if ("stdout" in e && typeof e.stdout === "string") parts.push(e.stdout);
  if ("stderr" in e && typeof e.stderr === "string") parts.push(e.stderr);
  if (parts.length === 0 && e instanceof Error) parts.push(e.message);
  return parts.join("").trim();
}

/**
 * gpg in batch mode. A verification verdict is the exit status alone;
 * what gpg prints is returned for the caller to show or drop.
 */
export class GpgVerifier implements SignatureVerifier {
  private readonly exec: ExecFn;

  constructor(
    private readonly gpgBinary = "gpg",
    private readonly timeoutMs = 60_000,
    exec?: ExecFn,
  ) {
    this.exec = exec ?? defaultExec;
  }

  async importKeys(keyFiles: string[], keyringPath: string): Promise<void> {
    await this.exec(
      this.gpgBinary,
      [
        "--batch",
        "--yes",
        "--trust-model",
        "always",
        "--import-options",
        "import-export",
        "--output",
        keyringPath,
        "--import",
        ...keyFiles,
      ],
      { timeout: this.timeoutMs },
    );
  }

  async verify(signaturePath: string, dataPath: string, keyringPath: string | null): Promise<VerifyOutcome> {
    const args = ["--batch"];
    if (keyringPath) args.push("--keyring", keyringPath);
    args.push("--verify", signaturePath, dataPath);

    try {
      const { stdout, stderr } = await this.exec(this.gpgBinary, args, { timeout: this.timeoutMs });
      return { valid: true, output: (stdout + stderr).trim() };
    } catch (e) {
      return { valid: false, output: outputOf(e) };
    }
  }
}
