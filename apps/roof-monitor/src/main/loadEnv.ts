import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

// Imported first by the entry point so monitoring config sees `.env` values.
dotenvExpand.expand(dotenv.config());
