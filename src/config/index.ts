// Load any environmental variables set in the .env file into process.env
import * as dotenv from 'dotenv';
dotenv.config();

// Retrieve each of our configuration components
import {common} from './components/common';
import {logger} from './components/logger';
import {db} from './components/db';
import {audit} from './components/audit';


// Export
export const config = {common, logger, db, audit};
