#!/usr/bin/env node
import * as dotenv from "dotenv";
import { runCli } from "./cli";

dotenv.config();

runCli(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    }
);
