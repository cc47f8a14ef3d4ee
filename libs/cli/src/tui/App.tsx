/**
 * App - Root TUI component of the launcher.
 *
 * Phase-driven rendering: browse → placeholder → confirm-run, plus the
 * remove confirmation, the create/edit form and the dry-run view. Running a
 * command leaves the TUI: the outcome is handed to `onOutcome` and the app
 * exits so the child owns the terminal.
 */

import React, { useCallback, useState } from 'react';
import { Box, useApp, useInput, useStdout } from 'ink';
import { LauncherError, TemplateResolution, isDestructive, runsAsChain } from '@quicklaunch/core';
import type { Entry, ExecutionPlan, Executor, NavigationIntent, PlaceholderRequest } from '@quicklaunch/core';
import type { QuickLaunchConfig } from '../config.js';
import { mapKey } from '../keymap.js';
import type { LauncherSession } from '../session.js';
import { formFields, formTitle, initialValues, submitForm } from './form.js';
import type { FormError, FormField, FormTarget, FormValues } from './form.js';
import { Header } from './components/Header.js';
import { QueryBar } from './components/QueryBar.js';
import { EntryList } from './components/EntryList.js';
import { Preview } from './components/Preview.js';
import { KeyHints } from './components/KeyHints.js';
import { Notice } from './components/Notice.js';
import type { NoticeMessage } from './components/Notice.js';
import { Confirm } from './components/Confirm.js';
import { PlaceholderPrompt } from './components/PlaceholderPrompt.js';
import { EntryForm } from './components/EntryForm.js';
import { DryRunView } from './components/DryRunView.js';

export type LauncherOutcome =
  | { type: 'run'; entry: Entry; command: string }
  | { type: 'quit' };

type Phase =
  | { name: 'browse' }
  | { name: 'placeholder'; entry: Entry; resolution: TemplateResolution; request: PlaceholderRequest }
  | { name: 'confirm-run'; entry: Entry; command: string }
  | { name: 'confirm-remove'; entry: Entry }
  | { name: 'form'; target: FormTarget; fields: FormField[]; initial: FormValues; error: FormError | null }
  | { name: 'dry-run'; entry: Entry; plan: ExecutionPlan };

export interface AppProps {
  session: LauncherSession;
  executor: Executor;
  config: Pick<QuickLaunchConfig, 'listHeight' | 'confirmDestructive'>;
  notice?: NoticeMessage | null;
  onOutcome: (outcome: LauncherOutcome) => void;
}

const BROWSE: Phase = { name: 'browse' };

export function App({ session, executor, config, notice: initialNotice = null, onOutcome }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const width = stdout?.columns ?? 80;

  const render = useCallback(() => session.viewModel(width, config.listHeight), [session, width, config.listHeight]);
  const [view, setView] = useState(render);
  const [phase, setPhase] = useState<Phase>(BROWSE);
  const [notice, setNotice] = useState<NoticeMessage | null>(initialNotice);

  const refresh = useCallback(() => setView(render()), [render]);

  const finish = useCallback((outcome: LauncherOutcome) => {
    onOutcome(outcome);
    exit();
  }, [onOutcome, exit]);

  const proceed = useCallback((entry: Entry, command: string) => {
    if (config.confirmDestructive && isDestructive(command)) {
      setPhase({ name: 'confirm-run', entry, command });
      return;
    }
    finish({ type: 'run', entry, command });
  }, [config.confirmDestructive, finish]);

  const startRun = useCallback((entry: Entry) => {
    if (entry.kind !== 'template') {
      proceed(entry, entry.command);
      return;
    }
    const resolution = new TemplateResolution(entry.command, entry.placeholders);
    const request = resolution.current();
    const resolved = resolution.result();
    if (request) {
      setPhase({ name: 'placeholder', entry, resolution, request });
    } else if (resolved !== null) {
      proceed(entry, resolved);
    }
  }, [proceed]);

  const openForm = useCallback((target: FormTarget) => {
    setPhase({
      name: 'form',
      target,
      fields: formFields(target),
      initial: initialValues(target),
      error: null,
    });
  }, []);

  const handleIntent = useCallback((intent: NavigationIntent) => {
    setNotice(null);
    switch (intent.type) {
      case 'quit':
        finish({ type: 'quit' });
        return;
      case 'execute':
        startRun(intent.entry);
        return;
      case 'dry-run': {
        const { entry } = intent;
        setPhase({ name: 'dry-run', entry, plan: executor.plan(entry.command, runsAsChain(entry.kind, entry.command)) });
        return;
      }
      case 'edit':
        openForm({ type: 'edit', entry: intent.entry });
        return;
      case 'create':
        openForm({ type: 'create', mode: intent.mode });
        return;
      case 'remove':
        setPhase({ name: 'confirm-remove', entry: intent.entry });
        return;
    }
  }, [executor, finish, openForm, startRun]);

  useInput((input, key) => {
    const event = mapKey(input, key);
    if (!event) return;
    const intent = session.engine.dispatch(event);
    refresh();
    if (intent) handleIntent(intent);
  }, { isActive: phase.name === 'browse' });

  const backToBrowse = useCallback((message: NoticeMessage | null = null) => {
    setNotice(message);
    setPhase(BROWSE);
    refresh();
  }, [refresh]);

  const handlePlaceholder = useCallback((value: string) => {
    if (phase.name !== 'placeholder') return;
    const next = phase.resolution.submit(value);
    if (next) {
      setPhase({ ...phase, request: next });
      return;
    }
    const command = phase.resolution.result();
    if (command !== null) proceed(phase.entry, command);
  }, [phase, proceed]);

  const handleRemove = useCallback(() => {
    if (phase.name !== 'confirm-remove') return;
    const { alias } = phase.entry;
    try {
      session.remove(alias);
      backToBrowse({ tone: 'success', text: `Removed '${alias}'` });
    } catch (err) {
      if (!(err instanceof LauncherError)) throw err;
      backToBrowse({ tone: 'error', text: err.message });
    }
  }, [phase, session, backToBrowse]);

  const handleSave = useCallback((values: FormValues) => {
    if (phase.name !== 'form') return;
    const outcome = submitForm(session, phase.target, values);
    if (outcome.ok) {
      backToBrowse({ tone: 'success', text: outcome.message });
    } else {
      setPhase({ ...phase, initial: values, error: outcome.error });
    }
  }, [phase, session, backToBrowse]);

  const cancelled = useCallback(() => backToBrowse({ tone: 'info', text: 'Cancelled' }), [backToBrowse]);

  return (
    <Box flexDirection="column">
      <Header mode={view.mode} matched={view.matched} total={view.total} totalUses={session.totalUses()} />

      {notice && phase.name === 'browse' && <Notice notice={notice} />}

      {phase.name === 'browse' && (
        <>
          <QueryBar query={view.query} />
          <EntryList view={view} />
          {view.previewContent && <Preview lines={view.previewContent} />}
          <KeyHints />
        </>
      )}

      {phase.name === 'placeholder' && (
        <PlaceholderPrompt
          key={`${phase.request.name}-${phase.request.retry}`}
          alias={phase.entry.alias}
          command={phase.entry.command}
          request={phase.request}
          onSubmit={handlePlaceholder}
          onCancel={() => {
            phase.resolution.cancel();
            cancelled();
          }}
        />
      )}

      {phase.name === 'confirm-run' && (
        <Confirm
          danger
          title={`'${phase.entry.alias}' looks destructive`}
          lines={[phase.command]}
          onConfirm={() => finish({ type: 'run', entry: phase.entry, command: phase.command })}
          onCancel={cancelled}
        />
      )}

      {phase.name === 'confirm-remove' && (
        <Confirm
          danger
          title={`Remove '${phase.entry.alias}'?`}
          lines={[phase.entry.command]}
          onConfirm={handleRemove}
          onCancel={cancelled}
        />
      )}

      {phase.name === 'form' && (
        <EntryForm
          key={phase.target.type === 'edit' ? phase.target.entry.alias : 'new'}
          title={formTitle(phase.target)}
          fields={phase.fields}
          initial={phase.initial}
          error={phase.error}
          onSubmit={handleSave}
          onCancel={cancelled}
        />
      )}

      {phase.name === 'dry-run' && (
        <DryRunView alias={phase.entry.alias} plan={phase.plan} onBack={() => backToBrowse()} />
      )}
    </Box>
  );
}
