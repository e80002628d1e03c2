import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { RemoteExecutor } from '../classes/remote-executor';
import {
  RemoteExecutionFailedError,
  ScriptExecutionError,
  ValidationError,
} from '../lib/errors';
import { EXTERNAL_IP, FakeTransport, rejectionOf } from './helpers';

const KEY = '/secrets/t1_private.key';

describe('RemoteExecutor', () => {
  let sandbox: sinon.SinonSandbox;
  let transport: FakeTransport;
  let sleep: sinon.SinonStub;
  let executor: RemoteExecutor;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    transport = new FakeTransport();
    sleep = sandbox.stub().resolves();
    executor = new RemoteExecutor(transport, { sleep });
  });

  afterEach(() => {
    sandbox.restore();
  });

  it('should retry the probe until the instance is reachable', async () => {
    const probe = sandbox.stub(transport, 'probe');
    probe.onCall(0).resolves({ kind: 'transportFailed', stderr: 'Connection refused' });
    probe.onCall(1).resolves({ kind: 'transportFailed', stderr: 'Connection refused' });
    probe.onCall(2).resolves({ kind: 'probed' });
    const copyFile = sandbox.spy(transport, 'copyFile');
    const runCommand = sandbox.spy(transport, 'runCommand');

    const output = await executor.run({
      externalIp: EXTERNAL_IP,
      keyPath: KEY,
      scriptPath: '/jobs/run.sh',
      retryWait: 5,
      maxRetry: 3,
    });

    expect(output).to.equal('job output\n');
    expect(probe.callCount).to.equal(3);
    expect(sleep.callCount).to.equal(2);
    expect(sleep.alwaysCalledWithExactly(5000)).to.equal(true);
    sinon.assert.callOrder(probe, copyFile, runCommand);
    expect(copyFile.calledOnceWithExactly(EXTERNAL_IP, '/jobs/run.sh', KEY)).to.equal(
      true
    );
    expect(
      runCommand.calledOnceWithExactly(EXTERNAL_IP, "bash -l 'run.sh'", KEY)
    ).to.equal(true);
  });

  it('should give up after maxRetry failed probes', async () => {
    const probe = sandbox.stub(transport, 'probe');
    probe.onCall(0).resolves({ kind: 'transportFailed', stderr: 'timeout' });
    probe.onCall(1).resolves({ kind: 'transportFailed', stderr: 'timeout' });
    probe
      .onCall(2)
      .resolves({ kind: 'transportFailed', stderr: 'Permission denied (publickey)' });
    const copyFile = sandbox.spy(transport, 'copyFile');
    const runCommand = sandbox.spy(transport, 'runCommand');

    const error = await rejectionOf(
      executor.run({
        externalIp: EXTERNAL_IP,
        keyPath: KEY,
        scriptPath: '/jobs/run.sh',
        retryWait: 5,
        maxRetry: 3,
      })
    );

    expect(error).to.be.instanceOf(RemoteExecutionFailedError);
    expect(error).to.have.property('stderr', 'Permission denied (publickey)');
    expect(probe.callCount).to.equal(3);
    expect(sleep.callCount).to.equal(2);
    expect(copyFile.called).to.equal(false);
    expect(runCommand.called).to.equal(false);
  });

  it('should purge the known host entry before connecting', async () => {
    const purge = sandbox.spy(transport, 'purgeKnownHost');
    const probe = sandbox.spy(transport, 'probe');

    await executor.run({
      externalIp: EXTERNAL_IP,
      keyPath: KEY,
      scriptPath: '/jobs/run.sh',
      retryWait: 5,
      maxRetry: 3,
    });

    expect(purge.calledOnceWithExactly(EXTERNAL_IP)).to.equal(true);
    sinon.assert.callOrder(purge, probe);
  });

  it('should carry on when the known host entry cannot be purged', async () => {
    sandbox
      .stub(transport, 'purgeKnownHost')
      .rejects(new Error('ssh-keygen: command not found'));

    const output = await executor.run({
      externalIp: EXTERNAL_IP,
      keyPath: KEY,
      scriptPath: '/jobs/run.sh',
      retryWait: 5,
      maxRetry: 3,
    });

    expect(output).to.equal('job output\n');
  });

  it('should not retry a failed upload', async () => {
    const probe = sandbox.spy(transport, 'probe');
    sandbox.stub(transport, 'copyFile').rejects(new Error('No space left on device'));

    const error = await rejectionOf(
      executor.run({
        externalIp: EXTERNAL_IP,
        keyPath: KEY,
        scriptPath: '/jobs/run.sh',
        retryWait: 5,
        maxRetry: 3,
      })
    );

    expect(error).to.be.instanceOf(ScriptExecutionError);
    expect(error).to.have.property(
      'message',
      'Error uploading /jobs/run.sh: No space left on device'
    );
    expect(probe.callCount).to.equal(1);
    expect(sleep.called).to.equal(false);
  });

  it('should fail with the exit code of a failing script', async () => {
    sandbox.stub(transport, 'runCommand').resolves({
      exitCode: 2,
      stdout: '',
      stderr: 'docker: image not found',
      duration: 10,
    });

    const error = await rejectionOf(
      executor.run({
        externalIp: EXTERNAL_IP,
        keyPath: KEY,
        scriptPath: '/jobs/run.sh',
        retryWait: 5,
        maxRetry: 3,
      })
    );

    expect(error).to.be.instanceOf(ScriptExecutionError);
    expect(error).to.have.property('exitCode', 2);
    expect(error).to.have.property('stderr', 'docker: image not found');
    expect(error).to.have.property('message', 'Script failed with exit code 2');
  });

  it('should report the script output when the remote stderr is empty', async () => {
    sandbox.stub(transport, 'runCommand').resolves({
      exitCode: 127,
      stdout: 'run.sh: line 3: gsutil: command not found\r\n',
      stderr: '',
      duration: 10,
    });

    const error = await rejectionOf(
      executor.run({
        externalIp: EXTERNAL_IP,
        keyPath: KEY,
        scriptPath: '/jobs/run.sh',
        retryWait: 5,
        maxRetry: 3,
      })
    );

    expect(error).to.be.instanceOf(ScriptExecutionError);
    expect(error).to.have.property(
      'stderr',
      'run.sh: line 3: gsutil: command not found\r\n'
    );
  });

  it('should refuse to run without a key', async () => {
    const probe = sandbox.spy(transport, 'probe');

    const error = await rejectionOf(
      executor.run({
        externalIp: EXTERNAL_IP,
        scriptPath: '/jobs/run.sh',
        retryWait: 5,
        maxRetry: 3,
      })
    );

    expect(error).to.be.instanceOf(ValidationError);
    expect(probe.called).to.equal(false);
  });

  it('should refuse to run without a script', async () => {
    const error = await rejectionOf(
      executor.run({
        externalIp: EXTERNAL_IP,
        keyPath: KEY,
        scriptPath: '',
        retryWait: 5,
        maxRetry: 3,
      })
    );

    expect(error).to.be.instanceOf(ValidationError);
  });
});
