import { bench, describe } from 'vitest';
import { PassphraseEngine } from './PassphraseEngine.js';
import { WordListService } from './WordListService.js';

const medium = new WordListService().loadBuiltInList('medium');
const engine = new PassphraseEngine();

describe('generate a 7 word passphrase from the medium list', () => {
    bench('literal separator', () => {
        engine.generate(7, { kind: 'literal', value: '-' }, false, medium.words);
    });

    bench('title case with mixed separators', () => {
        engine.generate(7, { kind: 'mixed' }, true, medium.words);
    });
});
