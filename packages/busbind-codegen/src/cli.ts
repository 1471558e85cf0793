// busbind-xmlgen entry point.

import { hideBin } from "yargs/helpers";
import { nodeIo, runXmlgen } from "./xmlgen.ts";

process.exitCode = await runXmlgen(hideBin(process.argv), nodeIo());
