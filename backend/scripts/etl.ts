import 'dotenv/config';
import { main } from '../src/etl.js';

process.exitCode = await main(process.env);
