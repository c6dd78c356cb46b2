import fs from "fs";
import path from "path";
import crypto from "crypto";

export function upsertEnvKey(content: string, key: string, value: string): string {
  const line = `${key}=${value}`;
  const regex = new RegExp(`^${key}=.*$`, "m");
  if (regex.test(content)) {
    return content.replace(regex, line);
  }
  const trimmed = content.trimEnd();
  return trimmed.length ? `${trimmed}\n${line}\n` : `${line}\n`;
}

export function generateApiKey(bytes: number = 32): string {
  return crypto.randomBytes(bytes).toString("hex");
}

export function writeApiKey(envPath: string, apiKey: string = generateApiKey()): string {
  const existing = fs.existsSync(envPath) ? fs.readFileSync(envPath, "utf-8") : "";
  fs.writeFileSync(envPath, upsertEnvKey(existing, "API_KEY", apiKey));
  return apiKey;
}

if (require.main === module) {
  const envPath = path.join(process.cwd(), ".env");
  const apiKey = writeApiKey(envPath);
  console.log(`Wrote API_KEY to ${envPath}`);
  console.log(`API_KEY=${apiKey}`);
}
