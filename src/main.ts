import { configFromQuery, resolveConfig } from './config';
import { ConfigError } from './errors';
import { Game } from './game';
import { LocalHighScoreStore } from './highScore';

function bootstrap() {
    const root = document.getElementById('app');
    if (!root) throw new Error('Missing #app element');
    try {
        new Game(root, { config: resolveConfig(configFromQuery(location.search)), highScores: new LocalHighScoreStore(localStorage) });
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error('[game] bad query parameters', err.issues);
            root.textContent = err.message;
            return;
        }
        throw err;
    }
}

bootstrap();
