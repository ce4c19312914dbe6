import { expect } from 'chai';
import fs from 'fs-extra';
import mock_fs from 'mock-fs';
import sinon from 'sinon';
import { formatUnitFile, fromRecord, fromValues } from '../../../src/common/quadlet/unit-file';
import { FsUnitFileWriter, OUTPUT_DIR_MODE, UNIT_FILE_MODE } from '../../../src/common/quadlet/writer';

describe('unit files', () => {
  it('formats sections separated by blank lines', () => {
    const contents = formatUnitFile([
      { name: 'Unit', entries: [['Description', 'web container']] },
      { name: 'Container', entries: [...fromValues('PublishPort', ['80', '443']), ...fromRecord('Label', { tier: 'web' })] },
    ]);
    expect(contents).to.equal('[Unit]\nDescription=web container\n\n[Container]\nPublishPort=80\nPublishPort=443\nLabel=tier=web\n');
  });

  describe('FsUnitFileWriter', () => {
    it('creates the directory and writes the file', () => {
      mock_fs({});
      const writer = new FsUnitFileWriter();
      writer.ensureDir('/units/quadlet');
      writer.writeFile('/units/quadlet/web.container', '[Unit]\n');
      expect(fs.readFileSync('/units/quadlet/web.container', 'utf-8')).to.equal('[Unit]\n');
    });

    it('overwrites existing files', () => {
      mock_fs({
        '/units/web.container': 'old',
      });
      new FsUnitFileWriter().writeFile('/units/web.container', 'new');
      expect(fs.readFileSync('/units/web.container', 'utf-8')).to.equal('new');
    });

    it('passes the unit file and directory modes', () => {
      const ensure_dir = sinon.stub(fs, 'ensureDirSync');
      const write_file = sinon.stub(fs, 'writeFileSync');
      const writer = new FsUnitFileWriter();
      writer.ensureDir('/units');
      writer.writeFile('/units/db.volume', '[Volume]\n');
      expect(ensure_dir.calledOnceWithExactly('/units', OUTPUT_DIR_MODE)).to.equal(true);
      expect(write_file.calledOnceWithExactly('/units/db.volume', '[Volume]\n', { mode: UNIT_FILE_MODE })).to.equal(true);
    });
  });
});
