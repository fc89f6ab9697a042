import 'dotenv/config';
import { sql } from 'drizzle-orm';
import { db, closeDatabase } from '../src/infrastructure/db';
import { documents } from '../src/infrastructure/db/schema';

async function reset() {
    const setupOnly = process.argv.includes('--setup');

    try {
        // pgvector must exist before drizzle-kit can create the embedding column
        await db.execute(sql`create extension if not exists vector`);
        console.log('✅ pgvector extension available.');

        if (!setupOnly) {
            console.log('🗑️  Cleaning documents...');
            const deleted = await db.delete(documents).returning({ id: documents.id });
            console.log(`✅ Removed ${deleted.length} documents.`);
        }
    } catch (error) {
        console.error('❌ Error preparing database:', error);
        process.exitCode = 1;
    } finally {
        await closeDatabase();
    }
}

void reset();
