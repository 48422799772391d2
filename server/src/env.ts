// Imported first by the entry point: `.env` must be in process.env before
// any other module reads it.
import { loadEnvFile } from "./config.js";

loadEnvFile();
