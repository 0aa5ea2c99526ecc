import { connectDB, disconnectDB } from '../src/config/database';
import { createMongoRepositories } from '../src/repositories/mongo';
import { ApiKeyService } from '../src/services/apiKey.service';
import { logger } from '../src/utils/logger';
import { patterns } from '../src/utils/validation';

// Usage: create-api-key <username> [email] [key name]
async function createApiKey() {
  const [username, email = '', name = 'Command line key'] = process.argv.slice(2);
  if (!username) {
    logger.error('Usage: create-api-key <username> [email] [key name]');
    process.exitCode = 1;
    return;
  }
  if (!patterns.username.test(username)) {
    logger.error(`Invalid username: ${username}`);
    process.exitCode = 1;
    return;
  }

  await connectDB();
  try {
    const repositories = createMongoRepositories();
    const user =
      (await repositories.users.findByUsername(username)) ?? (await repositories.users.create({ username, email }));

    const apiKey = await new ApiKeyService(repositories.apiKeys, repositories.users).create(user.id, { name });
    logger.info(`Issued API key "${apiKey.name}" for ${user.username}`);

    // The key itself goes to stdout so it can be piped
    process.stdout.write(`${apiKey.key}\n`);
  } finally {
    await disconnectDB();
  }
}

createApiKey().catch((error: unknown) => {
  logger.error(`Failed to create API key: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
