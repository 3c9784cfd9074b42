import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    Deadline,
    Operation,
    Patch,
    ascii,
    diff,
    sourceText,
    targetText,
    toTuples,
    ucs4,
    type Diff,
    type Text
} from '../src/index.js';

const t = (value: string): Text => ascii.text(value);
const { EQUAL, INSERT, DELETE } = Operation;

const lines = (from: number, to: number): string => {
    let result = '';
    for (let i = from; i <= to; i++) result += `line ${String(i).padStart(2, '0')}\n`;
    return result;
};

class RecordingPatch extends Patch {
    public halfMatches = 0;
    public lineModes = 0;
    public bisections = 0;

    public override _halfMatch(text1: Text, text2: Text, checklines: boolean, deadline: Deadline): Diff[] | undefined {
        this.halfMatches++;
        return super._halfMatch(text1, text2, checklines, deadline);
    }

    public override _lineMode(text1: Text, text2: Text, deadline: Deadline): Diff[] {
        this.lineModes++;
        return super._lineMode(text1, text2, deadline);
    }

    public override _bisect(text1: Text, text2: Text, deadline: Deadline): Diff[] {
        this.bisections++;
        return super._bisect(text1, text2, deadline);
    }
}

const assertCanonical = (diffs: Diff[]) => {
    for (let i = 0; i < diffs.length; i++) {
        assert.ok(diffs[i][1].bytes() > 0, `diff ${i} is empty`);
        if (i > 0) {
            assert.notStrictEqual(diffs[i][0], diffs[i - 1][0], `diffs ${i - 1} and ${i} share an operation`);
            assert.ok(!(diffs[i - 1][0] === INSERT && diffs[i][0] === DELETE), `insert before delete at ${i}`);
        }
    }
};

suite('Patch', () => {

    const runPatchTest = (title: string, text1: string, text2: string, expected: [Operation, string][], timeout = 0) => {
        test(title, () => {
            const patch = new Patch({ timeout });
            const result = patch.diff(t(text1), t(text2));
            assert.deepStrictEqual(toTuples(result, ascii), expected);
        });
    };

    runPatchTest('should return nothing for two empty texts', '', '', []);

    runPatchTest('should return one equality for identical texts', 'abc', 'abc', [[EQUAL, 'abc']]);

    runPatchTest('should handle pure insertion', '', 'abc', [[INSERT, 'abc']]);

    runPatchTest('should handle pure deletion', 'abc', '', [[DELETE, 'abc']]);

    runPatchTest(
        'should strip the common suffix',
        'abcXYZ',
        'XYZ',
        [[DELETE, 'abc'], [EQUAL, 'XYZ']]
    );

    runPatchTest(
        'should delete around an overlap',
        'abcXYZdef',
        'XYZ',
        [[DELETE, 'abc'], [EQUAL, 'XYZ'], [DELETE, 'def']]
    );

    runPatchTest(
        'should insert around an overlap',
        'XYZ',
        'abcXYZdef',
        [[INSERT, 'abc'], [EQUAL, 'XYZ'], [INSERT, 'def']]
    );

    runPatchTest(
        'should replace a single character',
        'a',
        'b',
        [[DELETE, 'a'], [INSERT, 'b']]
    );

    runPatchTest(
        'should keep the common prefix and suffix around a replacement',
        'hallo daar',
        'hallo hier',
        [[EQUAL, 'hallo '], [DELETE, 'daa'], [INSERT, 'hie'], [EQUAL, 'r']]
    );

    runPatchTest(
        'should find the single common character by bisection',
        'cat',
        'map',
        [[DELETE, 'c'], [INSERT, 'm'], [EQUAL, 'a'], [DELETE, 't'], [INSERT, 'p']]
    );

    runPatchTest(
        'should split on a half match when a timeout is set',
        '1234567890',
        'a345678z',
        [[DELETE, '12'], [INSERT, 'a'], [EQUAL, '345678'], [DELETE, '90'], [INSERT, 'z']],
        1
    );

    test('should refine replaced lines in line mode', () => {
        const text1 = lines(0, 19);
        const text2 = 'LINE 00\n' + lines(1, 18) + 'LINE 19\n';
        const result = new Patch({ timeout: 0 }).diff(t(text1), t(text2), true);

        assert.deepStrictEqual(toTuples(result, ascii), [
            [DELETE, 'line'],
            [INSERT, 'LINE'],
            [EQUAL, ' 00\n' + lines(1, 18)],
            [DELETE, 'line'],
            [INSERT, 'LINE'],
            [EQUAL, ' 19\n']
        ]);
    });

    test('should pass moved and unterminated lines through line mode', () => {
        const text1 = lines(0, 15) + 'tail without newline';
        const text2 = lines(8, 15) + lines(0, 7) + 'another tail';
        const result = new Patch({ timeout: 0 }).diff(t(text1), t(text2), true);

        assert.ok(sourceText(result).equals(t(text1).buffer()));
        assert.ok(targetText(result).equals(t(text2).buffer()));
        assertCanonical(result);
    });

    test('should diff ucs4 texts per character', () => {
        const result = new Patch().diff(ucs4.text('a€b'), ucs4.text('a£b'));
        assert.deepStrictEqual(toTuples(result, ucs4), [[EQUAL, 'a'], [DELETE, '€'], [INSERT, '£'], [EQUAL, 'b']]);
    });

    test('should reject texts of different encodings', () => {
        assert.throws(
            () => new Patch().diff(t('a'), ucs4.text('a')),
            { message: '[Patch] texts use different encodings (ascii, ucs4)' }
        );
    });

    test('should rebuild both texts in canonical form', () => {
        const pairs: [string, string][] = [
            ['The quick brown fox', 'The quack brown box'],
            ['abcdefghij', 'jihgfedcba'],
            ['xaxcxabc', 'abcy'],
            ['a\nb\nc\n', 'a\nc\nd\n'],
            ['mississippi', 'missouri'],
            [lines(0, 30), lines(2, 12) + 'inserted\n' + lines(14, 33)],
        ];

        for (const [text1, text2] of pairs) {
            for (const timeout of [0, 1]) {
                for (const checklines of [true, false]) {
                    const result = new Patch({ timeout }).diff(t(text1), t(text2), checklines);
                    assert.ok(sourceText(result).equals(t(text1).buffer()), `source of ${text1} -> ${text2}`);
                    assert.ok(targetText(result).equals(t(text2).buffer()), `target of ${text1} -> ${text2}`);
                    assertCanonical(result);
                }
            }
        }
    });

    test('should leave the input texts untouched', () => {
        const text1 = t('abcabcXY');
        const text2 = t('XabYcabc');
        const before1 = Array.from(text1.buffer().data());
        const before2 = Array.from(text2.buffer().data());

        const result = new Patch().diff(text1, text2);
        for (const [, buffer] of result) buffer.append(t('!').buffer());

        assert.deepStrictEqual(Array.from(text1.buffer().data()), before1);
        assert.deepStrictEqual(Array.from(text2.buffer().data()), before2);
    });

    test('diff() should match the engine', () => {
        const expected = toTuples(new Patch({ timeout: 0 }).diff(t('hallo daar'), t('hallo hier')), ascii);
        assert.deepStrictEqual(toTuples(diff({ timeout: 0 }, t('hallo daar'), t('hallo hier')), ascii), expected);
    });
});

suite('Patch toolbox', () => {

    test('_bisect falls back to a full replace once the deadline has passed', () => {
        let now = 0;
        const deadline = new Deadline(0.001, () => now);
        now = 10;

        const result = new Patch()._bisect(t('cat'), t('map'), deadline);
        assert.deepStrictEqual(toTuples(result, ascii), [[DELETE, 'cat'], [INSERT, 'map']]);
    });

    test('_bisect returns a valid script without a deadline', () => {
        const result = new Patch()._bisect(t('cat'), t('map'), new Deadline(0));
        assert.strictEqual(ascii.decode(sourceText(result)), 'cat');
        assert.strictEqual(ascii.decode(targetText(result)), 'map');
    });

    test('_overlap returns nothing when neither text contains the other', () => {
        assert.strictEqual(new Patch()._overlap(t('abc'), t('abd')), undefined);
    });

    test('_halfMatch puts the first text on the delete side', () => {
        const patch = new Patch();
        const result = patch._halfMatch(t('a345678z'), t('1234567890'), false, new Deadline(1));
        assert.ok(result);
        assert.deepStrictEqual(toTuples(result, ascii), [
            [DELETE, 'a'],
            [INSERT, '12'],
            [EQUAL, '345678'],
            [DELETE, 'z'],
            [INSERT, '90']
        ]);
    });

    test('_lineMode keeps whole lines that only one side changes', () => {
        const text1 = lines(0, 20);
        const text2 = lines(0, 9) + lines(11, 20);
        const result = new Patch({ timeout: 0 })._lineMode(t(text1), t(text2), new Deadline(0));
        assert.deepStrictEqual(toTuples(result, ascii), [
            [EQUAL, lines(0, 9)],
            [DELETE, 'line 10\n'],
            [EQUAL, lines(11, 20)]
        ]);
    });

    test('_compute skips the half match without a timeout', () => {
        const untimed = new RecordingPatch({ timeout: 0 });
        const result = untimed.diff(t('1234567890'), t('a345678z'));
        assert.strictEqual(untimed.halfMatches, 0);
        assert.ok(untimed.bisections > 0);
        assert.strictEqual(ascii.decode(sourceText(result)), '1234567890');
        assert.strictEqual(ascii.decode(targetText(result)), 'a345678z');

        const timed = new RecordingPatch({ timeout: 1 });
        timed.diff(t('1234567890'), t('a345678z'));
        assert.strictEqual(timed.halfMatches, 1);
        assert.strictEqual(timed.bisections, 0);
    });

    test('_compute uses line mode only above 100 characters and with checklines', () => {
        const atLimit = new RecordingPatch({ timeout: 0 });
        atLimit._compute(t('x'.repeat(100)), t('y'.repeat(100)), true, new Deadline(0));
        assert.strictEqual(atLimit.lineModes, 0);
        assert.ok(atLimit.bisections > 0);

        const noLines = new RecordingPatch({ timeout: 0 });
        noLines._compute(t('x'.repeat(101)), t('y'.repeat(101)), false, new Deadline(0));
        assert.strictEqual(noLines.lineModes, 0);
        assert.ok(noLines.bisections > 0);

        const aboveLimit = new RecordingPatch({ timeout: 0 });
        const result = aboveLimit._compute(t('x'.repeat(101)), t('y'.repeat(101)), true, new Deadline(0));
        assert.strictEqual(aboveLimit.lineModes, 1);
        assert.deepStrictEqual(toTuples(result, ascii), [[DELETE, 'x'.repeat(101)], [INSERT, 'y'.repeat(101)]]);
    });
});
