import * as fs from 'fs/promises';
import * as path from 'path';

import * as jsonFile from '../common/utils/json-file';

import { JsonCollection } from './json-collection';
import { Team, validateTeam } from './team.schema';

describe('JsonCollection', () => {
  let tempDir: string;
  let collection: JsonCollection<Team>;

  const core: Team = { name: 'core', dailyChannel: 'C1' };
  const web: Team = { name: 'web', dailyChannel: 'C2' };

  beforeEach(async () => {
    tempDir = path.join(process.cwd(), 'test-data-collection-' + Date.now());
    await fs.mkdir(tempDir, { recursive: true });
    collection = new JsonCollection(tempDir, 'teams', validateTeam);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should not cache a document whose write failed', async () => {
    await collection.replaceOne('core', core);
    jest.spyOn(jsonFile, 'writeJsonAtomic').mockRejectedValueOnce(new Error('disk full'));

    await expect(collection.replaceOne('web', web)).rejects.toThrow('disk full');

    expect(await collection.findOne('web')).toBeNull();
    expect(await collection.findAll()).toEqual([core]);
  });

  it('should keep saving after a failed write', async () => {
    jest.spyOn(jsonFile, 'writeJsonAtomic').mockRejectedValueOnce(new Error('disk full'));
    await expect(collection.replaceOne('web', web)).rejects.toThrow('disk full');

    await collection.replaceOne('web', web);
    collection.invalidate();

    expect(await collection.findOne('web')).toEqual(web);
  });

  it('should reject an invalid document without writing it', async () => {
    await expect(collection.replaceOne('bad', { name: '', dailyChannel: 'C3' })).rejects.toThrow(
      /Invalid team for bad/,
    );

    collection.invalidate();
    expect(await collection.findAll()).toEqual([]);
  });
});
