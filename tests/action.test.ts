import * as core from '@actions/core';

import { parseKeyValueLines, run } from '../src/action';
import { createImageClient } from '../src/docker-client';

jest.mock('@actions/core', () => ({
  getInput: jest.fn(),
  getBooleanInput: jest.fn(),
  getMultilineInput: jest.fn(),
  setOutput: jest.fn(),
  setFailed: jest.fn(),
  setSecret: jest.fn(),
  info: jest.fn(),
  debug: jest.fn(),
  warning: jest.fn(),
  error: jest.fn(),
}));
jest.mock('../src/docker-client', () => ({
  createImageClient: jest.fn(),
}));

describe('action', () => {
  const client = {
    build: jest.fn(),
    pull: jest.fn(),
    push: jest.fn(),
    list: jest.fn(),
    tag: jest.fn(),
    rmi: jest.fn(),
  };
  const originalSummaryFile = process.env.GITHUB_STEP_SUMMARY;

  const setInputs = (inputs: Record<string, string>): void => {
    (core.getInput as jest.Mock).mockImplementation((name: string) => inputs[name] ?? '');
    (core.getBooleanInput as jest.Mock).mockImplementation((name: string) => inputs[name] === 'true');
    (core.getMultilineInput as jest.Mock).mockImplementation((name: string) =>
      (inputs[name] ?? '').split('\n').filter((line) => line !== '')
    );
  };

  beforeEach(() => {
    jest.clearAllMocks();
    delete process.env.GITHUB_STEP_SUMMARY;
    (createImageClient as jest.Mock).mockReturnValue(client);
    client.build.mockResolvedValue({ imageId: 'sha256:abc' });
    client.push.mockResolvedValue({ digest: 'sha256:def' });
    client.list.mockResolvedValue([{ id: 'sha256:abc', size: 1234 }]);
    client.tag.mockResolvedValue(undefined);
    client.rmi.mockResolvedValue(undefined);
  });

  afterAll(() => {
    if (originalSummaryFile !== undefined) {
      process.env.GITHUB_STEP_SUMMARY = originalSummaryFile;
    }
  });

  describe('run', () => {
    const image = 'registry.example.com/team/app:1.0';
    const latest = 'registry.example.com/team/app:latest';

    it('builds, tags and pushes the image', async () => {
      setInputs({
        image,
        'additional-tags': latest,
        'build-args': 'VERSION=1.0',
        push: 'true',
        registry: 'registry.example.com',
        username: 'ci',
        password: 'test-secret',
      });

      await run();

      expect(core.setFailed).not.toHaveBeenCalled();
      expect(core.setSecret).toHaveBeenCalledWith('test-secret');
      expect(createImageClient).toHaveBeenCalledWith({
        registry: 'registry.example.com',
        user: 'ci',
        password: 'test-secret',
      });
      expect(client.build).toHaveBeenCalledWith(
        '.',
        image,
        { VERSION: '1.0' },
        { dockerfile: undefined, labels: {}, target: undefined }
      );
      expect(client.tag).toHaveBeenCalledWith(image, latest);
      expect(client.push).toHaveBeenNthCalledWith(1, image);
      expect(client.push).toHaveBeenNthCalledWith(2, latest);
      expect(client.list).toHaveBeenCalledWith({ reference: image });
      expect(client.rmi).not.toHaveBeenCalled();

      expect(core.setOutput).toHaveBeenCalledWith('image', image);
      expect(core.setOutput).toHaveBeenCalledWith('image-id', 'sha256:abc');
      expect(core.setOutput).toHaveBeenCalledWith('digest', 'sha256:def');
      expect(core.setOutput).toHaveBeenCalledWith('image-size', 1234);
      expect(core.setOutput).toHaveBeenCalledWith('pushed', true);
    });

    it('passes build options from the inputs', async () => {
      setInputs({
        image: 'app:dev',
        context: './services/api',
        dockerfile: 'docker/Dockerfile.api',
        labels: 'team=platform\n# comment',
        target: 'runtime',
      });

      await run();

      expect(client.build).toHaveBeenCalledWith(
        './services/api',
        'app:dev',
        {},
        { dockerfile: 'docker/Dockerfile.api', labels: { team: 'platform' }, target: 'runtime' }
      );
      expect(client.push).not.toHaveBeenCalled();
      expect(core.setOutput).toHaveBeenCalledWith('digest', '');
      expect(core.setOutput).toHaveBeenCalledWith('pushed', false);
    });

    it('removes local tags after pushing', async () => {
      setInputs({ image, 'additional-tags': latest, push: 'true', 'remove-after-push': 'true' });

      await run();

      expect(client.rmi).toHaveBeenNthCalledWith(1, image);
      expect(client.rmi).toHaveBeenNthCalledWith(2, latest);
      expect(core.info).toHaveBeenCalledWith(expect.stringContaining(', pushed 2 tag(s), removed local tags'));
    });

    it('sets the outputs before removing local tags', async () => {
      setInputs({ image, push: 'true', 'remove-after-push': 'true' });
      client.rmi.mockRejectedValue(new Error('conflict: image is in use'));

      await run();

      expect(core.setOutput).toHaveBeenCalledWith('digest', 'sha256:def');
      expect(core.setOutput).toHaveBeenCalledWith('pushed', true);
      expect(core.setFailed).toHaveBeenCalledWith('conflict: image is in use');
    });

    it('warns when asked to remove tags without pushing', async () => {
      setInputs({ image, 'remove-after-push': 'true' });

      await run();

      expect(client.rmi).not.toHaveBeenCalled();
      expect(core.warning).toHaveBeenCalledWith("'remove-after-push' has no effect unless 'push' is enabled");
    });

    it('passes the no-cache input to the client', async () => {
      setInputs({ image, 'no-cache': 'false', 'docker-host': 'unix:///var/run/docker.sock' });

      await run();

      expect(createImageClient).toHaveBeenCalledWith(
        expect.objectContaining({ host: 'unix:///var/run/docker.sock', noCache: false })
      );
    });

    it('fails the action when the build fails', async () => {
      setInputs({ image, push: 'true' });
      client.build.mockRejectedValue(new Error('build failed'));

      await run();

      expect(core.setFailed).toHaveBeenCalledWith('build failed');
      expect(client.push).not.toHaveBeenCalled();
    });

    it('reports unknown errors', async () => {
      setInputs({ image });
      client.build.mockRejectedValue('boom');

      await run();

      expect(core.setFailed).toHaveBeenCalledWith('Unknown error occurred');
    });
  });

  describe('parseKeyValueLines', () => {
    it('parses entries and reads name-only entries from the environment', () => {
      const result = parseKeyValueLines(['A=1', ' B = two ', '# comment', '', 'FROM_ENV', 'MISSING', '=x', 'C=a=b'], {
        FROM_ENV: 'from-env',
      });

      expect(result).toEqual({ A: '1', B: 'two', FROM_ENV: 'from-env', C: 'a=b' });
      expect(core.debug).toHaveBeenCalledWith('Skipping MISSING: not set in the environment');
      expect(core.warning).toHaveBeenCalledWith('Ignoring entry without a name: =x');
    });
  });
});
