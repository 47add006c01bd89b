import * as fs from "fs";
import * as path from "path";
import { loadConfigFromDotenv } from "../config";
import { Database, createPool } from "../db";

// データベース接続を待つ関数
async function waitForDatabase(
  database: Database,
  maxAttempts = 10,
  delayMs = 2000
): Promise<boolean> {
  console.log("Waiting for database to be ready...");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    console.log(`Connection attempt ${attempt}/${maxAttempts}...`);

    const isConnected = await database.testConnection();
    if (isConnected) {
      console.log("Database is ready!");
      return true;
    }

    if (attempt < maxAttempts) {
      console.log(`Waiting ${delayMs}ms before retry...`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  return false;
}

function readScript(name: string): string {
  return fs.readFileSync(path.join(__dirname, "../../sql_scripts", name), "utf8");
}

async function setup() {
  const config = loadConfigFromDotenv();
  const database = new Database(
    createPool(config),
    config.poolConnectionTimeoutMs,
    config.poolMaxSize
  );

  try {
    // データベースの準備ができるまで待つ
    const isReady = await waitForDatabase(database);
    if (!isReady) {
      throw new Error("Could not connect to database after multiple attempts");
    }

    await database.withClient(async (db) => {
      console.log("\nSetting up database schema...");
      await db.query({
        intent: "setup.schema",
        text: readScript("01_create_schema.sql"),
        values: [],
      });
      console.log("✓ Schema created successfully");

      console.log("\nInserting sample data...");
      await db.query({
        intent: "setup.seed",
        text: readScript("02_insert_sample_data.sql"),
        values: [],
      });
      console.log("✓ Sample data inserted successfully");

      // データ件数の確認
      const counts = await db.query({
        intent: "setup.summary",
        text: `
        SELECT
          (SELECT COUNT(*) FROM users) as users,
          (SELECT COUNT(*) FROM posts) as posts,
          (SELECT COUNT(*) FROM tags) as tags,
          (SELECT COUNT(*) FROM posts_to_tags) as posts_to_tags
      `,
        values: [],
      });

      console.log("\n📊 Data summary:");
      console.table(counts[0]);
    });

    console.log("\n✅ Database setup completed successfully!");
    await database.close();
    process.exit(0);
  } catch (error) {
    console.error("\n❌ Error setting up database:", error);
    await database.close();
    process.exit(1);
  }
}

setup().catch((error) => {
  console.error("\n❌ Error closing database:", error);
  process.exit(1);
});
