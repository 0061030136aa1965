#!/usr/bin/env node
import { buildProgram } from "./program";

buildProgram().parse(process.argv);
