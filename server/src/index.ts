import { createApp } from './app';
import { initDB, openDatabase } from './db';
import { log } from './logger';

const PORT = process.env.PORT || 3001;

// Initialize Database
const db = openDatabase();
initDB(db);

const app = createApp(db);

// Start Server
app.listen(PORT, () => {
    log(`[SERVER] Running on http://localhost:${PORT}`);
});
