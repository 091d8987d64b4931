// Load environment variables before any module reads them.
// .env.local takes precedence over .env
import { config } from "dotenv";

config({ path: ".env" });
config({ path: ".env.local", override: true });
