import {
  joinSceneText,
  parseScenesJson,
  scenesFromModelOutput,
  stripCodeFence,
  validateScenes,
} from '../pipeline/scene-validator.js';
import { ScriptValidationError } from '../utils/errors.js';

describe('validateScenes', () => {
  it('renumbers scenes in array order and trims text', () => {
    const scenes = validateScenes([
      { scene: 7, text: '  First line. ', visual_description: ' A sunrise ' },
      { scene: 3, text: 'Second line.', visual_description: 'A river' },
    ]);
    expect(scenes).toEqual([
      { scene: 1, text: 'First line.', visual_description: 'A sunrise' },
      { scene: 2, text: 'Second line.', visual_description: 'A river' },
    ]);
  });

  it('falls back to the scene text when the visual description is missing or blank', () => {
    const scenes = validateScenes([
      { text: 'No picture given.' },
      { text: 'Blank picture.', visual_description: '   ' },
    ]);
    expect(scenes.map(s => s.visual_description)).toEqual(['No picture given.', 'Blank picture.']);
  });

  it('caps the fallback visual description at 500 characters', () => {
    const [scene] = validateScenes([{ text: 'x'.repeat(600) }]);
    expect(scene?.visual_description).toHaveLength(500);
  });

  it('truncates to maxScenes instead of rejecting', () => {
    const raw = Array.from({ length: 5 }, (_v, i) => ({ text: `Scene ${i}` }));
    expect(validateScenes(raw, 3).map(s => s.text)).toEqual(['Scene 0', 'Scene 1', 'Scene 2']);
  });

  it('rejects an empty list and non-arrays', () => {
    expect(() => validateScenes([])).toThrow('scenes must be a non-empty list');
    expect(() => validateScenes({ scenes: [] })).toThrow(ScriptValidationError);
  });

  it('names the offending index', () => {
    expect(() => validateScenes([{ text: 'ok' }, 'nope'])).toThrow('scene 1 must be an object');
    expect(() => validateScenes([{ text: 'ok' }, { text: '  ' }])).toThrow("scene 1 missing 'text'");
    expect(() => validateScenes([{ visual_description: 'only a picture' }])).toThrow("scene 0 missing 'text'");
  });
});

describe('model output parsing', () => {
  it('strips a json code fence', () => {
    expect(stripCodeFence('```json\n[{"text":"a"}]\n```')).toBe('[{"text":"a"}]');
    expect(stripCodeFence('  [1]  ')).toBe('[1]');
  });

  it('raises ScriptValidationError on malformed JSON', () => {
    expect(() => parseScenesJson('[{"text": ')).toThrow('Script scenes response was not valid JSON');
  });

  it('goes from raw text to joined narration', () => {
    const scenes = scenesFromModelOutput('```\n[{"text":"One."},{"text":"Two.","visual_description":"Stars"}]\n```');
    expect(joinSceneText(scenes)).toBe('One.\n\nTwo.');
    expect(scenes[1]).toEqual({ scene: 2, text: 'Two.', visual_description: 'Stars' });
  });
});
