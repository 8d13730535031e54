/**
 * Degen Index - Reddit API demo
 *
 * Fetches a few top-level comments from one public thread and prints mocked
 * classification records. The production classifier is not part of this
 * repository.
 *
 * Usage:
 *   export REDDIT_CLIENT_ID="your_client_id"
 *   export REDDIT_CLIENT_SECRET="your_client_secret"
 *   npm start -- --submission-id <reddit_post_id>
 */

import dotenv from "dotenv";
import { main } from "./cli";

dotenv.config();

main(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("❌ Unexpected error:", error);
    process.exitCode = 1;
  });
