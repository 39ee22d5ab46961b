// Load .env from the repo root when present; shell exports still win.
import { config } from 'dotenv';

config();
