import { spawn } from "node:child_process";
import type { ToolCommands } from "@docsift/types";
import { ExternalServiceError, TimeoutError, ToolUnavailableError } from "@docsift/errors";

export interface ToolRunOptions {
  timeoutMs: number;
}

/**
 * Bytes in, text out, bounded by a timeout. How the tool runs (process,
 * library, remote call) is up to the implementation.
 */
export interface IExternalTool {
  readonly name: string;
  readonly available: boolean;
  run(input: Uint8Array, options: ToolRunOptions): Promise<string>;
}

/**
 * Runs a command line, feeding the input on stdin and reading stdout.
 * The child is killed when the timeout expires.
 */
export class SubprocessTool implements IExternalTool {
  readonly name: string;
  private readonly command: string[];

  constructor(name: string, command: string[]) {
    this.name = name;
    this.command = command;
  }

  get available(): boolean {
    return this.command.length > 0;
  }

  run(input: Uint8Array, { timeoutMs }: ToolRunOptions): Promise<string> {
    const [executable, ...args] = this.command;
    if (executable === undefined) {
      return Promise.reject(new ToolUnavailableError(this.name, `Tool "${this.name}" is not configured`));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(executable, args, { stdio: ["pipe", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      let stderr = "";
      let settled = false;

      const finish = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
      };

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish(() => {
          reject(new TimeoutError(`${this.name} timed out after ${String(timeoutMs)}ms`, timeoutMs));
        });
      }, timeoutMs);

      child.stdout.on("data", (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("error", (err: NodeJS.ErrnoException) => {
        finish(() => {
          if (err.code === "ENOENT") {
            reject(new ToolUnavailableError(this.name, `Tool "${this.name}" is not installed (${executable})`));
            return;
          }
          reject(new ExternalServiceError(`Failed to start ${this.name}: ${err.message}`, this.name));
        });
      });

      child.on("close", (code) => {
        finish(() => {
          if (code !== 0) {
            reject(
              new ExternalServiceError(
                `${this.name} exited with code ${String(code)}: ${stderr.trim()}`,
                this.name,
              ),
            );
            return;
          }
          resolve(Buffer.concat(stdout).toString("utf8"));
        });
      });

      // EPIPE when the tool exits without reading stdin; close/error report the outcome
      child.stdin.on("error", () => undefined);
      child.stdin.end(Buffer.from(input));
    });
  }
}

export interface ExternalTools {
  ocr: IExternalTool;
  pdftotext: IExternalTool;
  pdfTables: IExternalTool;
  pdfImageOcr: IExternalTool;
  office: IExternalTool;
}

export function createExternalTools(commands: ToolCommands): ExternalTools {
  return {
    ocr: new SubprocessTool("ocr", commands.ocr),
    pdftotext: new SubprocessTool("pdftotext", commands.pdftotext),
    pdfTables: new SubprocessTool("pdf-tables", commands.pdfTables),
    pdfImageOcr: new SubprocessTool("pdf-image-ocr", commands.pdfImageOcr),
    office: new SubprocessTool("office", commands.office),
  };
}
