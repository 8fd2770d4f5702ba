import fs from "node:fs/promises";
import path from "node:path";
import { stringify } from "yaml";
import { configFilePath, writeConfigFile } from "../config/config-file";
import { DEFAULT_ENTRY_FILE } from "../config/resolve-config";
import { zResourceName } from "../types/app-schema";
import { ConfigError } from "../lib/errors";
import type { Logger } from "../lib/logger";

const STARTER_HANDLER = `exports.handler = (req, res) => {
  res.json({ message: "hello from " + (process.env.STAGE || "local") });
};
`;

export interface InitResult {
  created: string[];
  skipped: string[];
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Scaffolds a project: an application definition with one HTTP function and
 * route, a starter handler and an empty `.stageform/config.json`. Existing
 * files are left alone.
 */
export async function initProject(rootDir: string, name: string, logger: Logger): Promise<InitResult> {
  const parsedName = zResourceName.safeParse(name);
  if (!parsedName.success) {
    throw new ConfigError(`Invalid application name "${name}": ${parsedName.error.issues[0]?.message ?? "invalid"}`);
  }

  const result: InitResult = { created: [], skipped: [] };
  const write = async (file: string, create: () => Promise<void>): Promise<void> => {
    if (await exists(file)) {
      result.skipped.push(file);
      logger.warn("File exists; leaving it unchanged", { path: file });
      return;
    }
    await create();
    result.created.push(file);
    logger.info("Created", { path: file });
  };

  const appFile = path.join(rootDir, DEFAULT_ENTRY_FILE);
  await write(appFile, () =>
    fs.writeFile(
      appFile,
      stringify({
        name: parsedName.data,
        function: { runtime: "nodejs20", entryPoint: "handler" },
        routes: [{ path: "/", methods: ["GET"] }]
      }),
      "utf-8"
    )
  );

  const handlerFile = path.join(rootDir, "index.js");
  await write(handlerFile, () => fs.writeFile(handlerFile, STARTER_HANDLER, "utf-8"));

  const configFile = configFilePath(rootDir);
  await write(configFile, () => writeConfigFile(rootDir, { stages: {} }));

  return result;
}
