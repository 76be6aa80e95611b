import dotenv from "dotenv";
import { createProgram } from "./commands";

dotenv.config();

await createProgram().parseAsync(process.argv);
