/**
 * Workspace-wide action parameters, stored in .itemflow/settings/params.yml.
 */

import { z } from "zod";
import { getLogger } from "./logging.js";
import { readYamlFile, writeYamlFile } from "./persisted-yaml.js";
import { errorMessage } from "./errors.js";

const log = getLogger("params");

const paramsFileSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export class ParamState {
  private values: Record<string, string> = {};

  constructor(private readonly savePath: string) {
    this.reload();
  }

  reload(): void {
    try {
      const parsed = paramsFileSchema.parse(readYamlFile(this.savePath) ?? {});
      this.values = Object.fromEntries(
        Object.entries(parsed).map(([k, v]) => [k, String(v)]),
      );
    } catch (err) {
      log.warn(`Ignoring invalid params file ${this.savePath}: ${errorMessage(err)}`);
      this.values = {};
    }
  }

  get(name: string): string | undefined {
    return this.values[name];
  }

  all(): Record<string, string> {
    return { ...this.values };
  }

  set(name: string, value: string): void {
    this.values[name] = value;
    writeYamlFile(this.savePath, this.values);
  }

  unset(name: string): void {
    delete this.values[name];
    writeYamlFile(this.savePath, this.values);
  }
}
