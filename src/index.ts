import dotenv from 'dotenv';
import { runCli } from './cli';

dotenv.config();

process.exitCode = await runCli(process.argv);
