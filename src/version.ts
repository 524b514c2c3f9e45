import { createRequire } from "node:module";
import { isRecord } from "./json.js";

const require = createRequire(import.meta.url);
const pkg: unknown = require("../package.json");

export const VERSION = isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "0.0.0";
