/**
 * Agent Runner Tests
 */

import {
  CREATIVE_PROMPT_SUFFIX,
  AgentRunnerDeps,
  buildAgentPrompt,
  runAgentOnPair,
  runAgentVariant,
} from '../runner';
import { AgentExecutionError } from '../../utils/errors';
import { FakeAgent, FakeVcs, WORKSPACE, sha } from '../../../tests/helpers/fakes';

const BASE = sha('f00dcafe');

describe('Agent Runner', () => {
  let vcs: FakeVcs;

  beforeEach(() => {
    vcs = new FakeVcs();
    vcs.addCommit(BASE, [], { 'app.py': 'x = 1\n' });
    vcs.refs.set('f00dcafe-base', BASE);
  });

  function depsFor(agent: FakeAgent): AgentRunnerDeps {
    return { vcs, workspace: WORKSPACE, agent };
  }

  describe('buildAgentPrompt', () => {
    it('should format the issue as a heading followed by its body', () => {
      expect(buildAgentPrompt(42, 'Crash on empty input', 'Steps to reproduce...')).toBe(
        '# Issue #42: Crash on empty input\n\nSteps to reproduce...'
      );
    });
  });

  describe('runAgentVariant', () => {
    it('should commit the agent edits on the agent snapshot', async () => {
      const agent = new FakeAgent(vcs, (files) => {
        files['app.py'] = 'x = 2\n';
        return 0;
      });

      const commit = await runAgentVariant(depsFor(agent), {
        h: 'f00dcafe',
        baseCommit: BASE,
        prompt: 'fix it',
        variant: 'plain',
      });

      expect(commit).not.toBe(BASE);
      expect(vcs.refs.get('f00dcafe-agent')).toBe(commit);
      expect(vcs.filesAt(commit)).toEqual({ 'app.py': 'x = 2\n' });
      expect(vcs.commits.get(commit)?.parents).toEqual([BASE]);
    });

    it('should leave the snapshot at base when the agent changes nothing', async () => {
      const agent = new FakeAgent(vcs, () => 0);

      const commit = await runAgentVariant(depsFor(agent), {
        h: 'f00dcafe',
        baseCommit: BASE,
        prompt: 'fix it',
        variant: 'creative',
      });

      expect(commit).toBe(BASE);
      expect(vcs.refs.get('f00dcafe-agent-creative')).toBe(BASE);
    });

    it('should reset an earlier attempt to base before running', async () => {
      const first = new FakeAgent(vcs, (files) => {
        files['first.txt'] = 'one\n';
        return 0;
      });
      await runAgentVariant(depsFor(first), { h: 'f00dcafe', baseCommit: BASE, prompt: 'p', variant: 'plain' });

      const second = new FakeAgent(vcs, (files) => {
        files['second.txt'] = 'two\n';
        return 0;
      });
      const commit = await runAgentVariant(depsFor(second), {
        h: 'f00dcafe',
        baseCommit: BASE,
        prompt: 'p',
        variant: 'plain',
      });

      expect(vcs.filesAt(commit)).toEqual({ 'app.py': 'x = 1\n', 'second.txt': 'two\n' });
      expect(vcs.commits.get(commit)?.parents).toEqual([BASE]);
    });

    it('should throw AgentExecutionError on a non-zero exit', async () => {
      const agent = new FakeAgent(vcs, () => 2);

      await expect(
        runAgentVariant(depsFor(agent), { h: 'f00dcafe', baseCommit: BASE, prompt: 'p', variant: 'plain' })
      ).rejects.toThrow('Agent failed on f00dcafe-agent (exit code 2): agent crashed');
    });
  });

  describe('runAgentOnPair', () => {
    const request = {
      h: 'f00dcafe',
      baseCommit: BASE,
      issueNumber: 42,
      issueTitle: 'Crash',
      issueBody: 'It crashes.',
    };

    it('should run the plain prompt, then the creative prompt', async () => {
      const agent = new FakeAgent(vcs, () => 0);

      await runAgentOnPair(depsFor(agent), request);

      expect(agent.prompts).toEqual([
        '# Issue #42: Crash\n\nIt crashes.',
        '# Issue #42: Crash\n\nIt crashes.' + CREATIVE_PROMPT_SUFFIX,
      ]);
    });

    it('should use a configured creative suffix', async () => {
      const agent = new FakeAgent(vcs, () => 0);

      await runAgentOnPair({ ...depsFor(agent), creativeSuffix: '\n\nThink big.' }, request);

      expect(agent.prompts[1]).toBe('# Issue #42: Crash\n\nIt crashes.\n\nThink big.');
    });

    it('should run the creative variant even when the plain one fails', async () => {
      const agent = new FakeAgent(vcs, (files, prompt) => {
        if (!prompt.endsWith(CREATIVE_PROMPT_SUFFIX)) return 1;
        files['app.py'] = 'x = 3\n';
        return 0;
      });

      const result = await runAgentOnPair(depsFor(agent), request);

      expect(result.plain.ok).toBe(false);
      if (!result.plain.ok) {
        expect(result.plain.error).toBeInstanceOf(AgentExecutionError);
      }
      expect(result.creative.ok).toBe(true);
      if (result.creative.ok) {
        expect(vcs.filesAt(result.creative.commit)).toEqual({ 'app.py': 'x = 3\n' });
      }
    });

    it('should check the base snapshot out again afterwards', async () => {
      const agent = new FakeAgent(vcs, (files) => {
        files['app.py'] = 'x = 9\n';
        return 0;
      });

      await runAgentOnPair(depsFor(agent), request);

      expect(vcs.head).toBe('f00dcafe-base');
      expect(vcs.worktree).toEqual({ 'app.py': 'x = 1\n' });
    });
  });
});
