import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { DEFAULT_REPORT_CONFIG, readReportConfigFile, resolveReportConfig } from "../src/config/config.js";
import { ConfigurationError } from "../src/core/errors.js";

async function mkTmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "dept-report-config-"));
}

async function writeConfig(dir: string, contents: string): Promise<string> {
  const p = path.join(dir, "report.yaml");
  await fs.writeFile(p, contents, { encoding: "utf8" });
  return p;
}

describe("report config", () => {
  test("falls back to the built-in defaults", async () => {
    expect(await resolveReportConfig({})).toEqual({
      input_file: "test.csv",
      output_file: "result.csv",
      separator: ";"
    });
    expect(await resolveReportConfig({ flags: {} })).toEqual(DEFAULT_REPORT_CONFIG);
  });

  test("flags win over the config file, which wins over defaults", async () => {
    const dir = await mkTmpDir();
    const configFile = await writeConfig(dir, "input_file: staff.csv\nseparator: ','\n");
    expect(await resolveReportConfig({ config_file: configFile })).toEqual({
      input_file: "staff.csv",
      output_file: "result.csv",
      separator: ","
    });
    expect(
      await resolveReportConfig({ config_file: configFile, flags: { separator: "|", output_file: "out.csv" } })
    ).toEqual({
      input_file: "staff.csv",
      output_file: "out.csv",
      separator: "|"
    });
  });

  test("an empty config file means no overrides", async () => {
    const dir = await mkTmpDir();
    const configFile = await writeConfig(dir, "");
    expect(await readReportConfigFile(configFile)).toEqual({});
  });

  test("rejects unknown keys in the config file", async () => {
    const dir = await mkTmpDir();
    const configFile = await writeConfig(dir, "delimiter: ','\n");
    await expect(readReportConfigFile(configFile)).rejects.toThrow(ConfigurationError);
    await expect(readReportConfigFile(configFile)).rejects.toThrow(/Unrecognized key/);
  });

  test("rejects an empty separator", async () => {
    await expect(resolveReportConfig({ flags: { separator: "" } })).rejects.toThrow(
      "options: separator: separator must not be empty"
    );
    const dir = await mkTmpDir();
    const configFile = await writeConfig(dir, "separator: ''\n");
    await expect(readReportConfigFile(configFile)).rejects.toThrow(
      `${configFile}: separator: separator must not be empty`
    );
  });

  test("reports a config file that cannot be read", async () => {
    const dir = await mkTmpDir();
    const missing = path.join(dir, "nope.yaml");
    await expect(resolveReportConfig({ config_file: missing })).rejects.toThrow(
      `Cannot read config file ${missing}:`
    );
  });
});
