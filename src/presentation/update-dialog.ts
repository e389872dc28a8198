import type { VersionStatus } from '../models';
import { LaunchMode, launchAppStore, type UrlLauncher } from './url-launcher';

export type DialogActionRole = 'update' | 'dismiss';

export interface DialogAction {
  role: DialogActionRole;
  label: string;
  onPress: () => Promise<void>;
}

export interface UpdateDialog {
  title: string;
  text: string;
  /** Whether tapping outside or the back gesture closes the dialog */
  dismissible: boolean;
  actions: DialogAction[];
}

/**
 * Renders dialogs on the host platform
 */
export interface DialogPresenter {
  present(dialog: UpdateDialog): Promise<void>;
  close(): void;
}

export interface UpdateDialogOptions {
  title?: string;
  text?: string;
  updateButtonText?: string;
  allowDismissal?: boolean;
  dismissButtonText?: string;
  dismissAction?: () => void | Promise<void>;
  launchMode?: LaunchMode;
}

interface UpdateDialogCollaborators {
  presenter: DialogPresenter;
  launcher: UrlLauncher;
}

export function defaultDialogText(status: VersionStatus): string {
  return `You can now update this app from ${status.localVersion} to ${status.storeVersion}`;
}

/**
 * Builds the update prompt for a status.
 *
 * The update action opens the store page and then closes the dialog when
 * dismissal is allowed; a failed launch rejects `onPress`. A status built
 * with `preferNewerLocalShowsChangelog` gives an informational dialog with
 * no actions.
 */
export function buildUpdateDialog(
  status: VersionStatus,
  { presenter, launcher }: UpdateDialogCollaborators,
  options: UpdateDialogOptions = {}
): UpdateDialog {
  const {
    title = 'Update Available',
    text = defaultDialogText(status),
    updateButtonText = 'Update',
    allowDismissal = true,
    dismissButtonText = 'Maybe Later',
    dismissAction,
    launchMode = LaunchMode.ExternalApplication,
  } = options;

  if (status.preferNewerLocalShowsChangelog) {
    return { title, text, dismissible: allowDismissal, actions: [] };
  }

  const actions: DialogAction[] = [
    {
      role: 'update',
      label: updateButtonText,
      onPress: async () => {
        await launchAppStore(status.storeLink, launcher, launchMode);
        if (allowDismissal) {
          presenter.close();
        }
      },
    },
  ];

  if (allowDismissal) {
    actions.push({
      role: 'dismiss',
      label: dismissButtonText,
      onPress: async () => {
        if (dismissAction) {
          await dismissAction();
        } else {
          presenter.close();
        }
      },
    });
  }

  return { title, text, dismissible: allowDismissal, actions };
}
