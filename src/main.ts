#!/usr/bin/env node
import { RegisterFileCompiler } from "./compiler";

new RegisterFileCompiler().run(process.argv).then((code) => process.exit(code));
