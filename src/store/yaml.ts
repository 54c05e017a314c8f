import YAML from "yaml";
import { readTextFile } from "./fs.js";

export async function readYamlFile(filePath: string): Promise<unknown> {
  const s = await readTextFile(filePath);
  return YAML.parse(s);
}
