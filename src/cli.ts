#!/usr/bin/env node
import { main } from './cliProgram';

void main();
