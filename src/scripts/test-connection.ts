import { loadConfigFromDotenv } from "../config";
import { Database, createPool } from "../db";

async function main() {
  const config = loadConfigFromDotenv();
  const database = new Database(
    createPool(config),
    config.poolConnectionTimeoutMs,
    config.poolMaxSize
  );

  console.log("Testing database connection...");

  const isConnected = await database.testConnection();
  await database.close();

  if (isConnected) {
    console.log("✅ Connection successful!");
    process.exit(0);
  } else {
    console.log("❌ Connection failed!");
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Error:", error);
  process.exit(1);
});
