export { LaunchMode, launchAppStore } from './url-launcher';
export type { UrlLauncher } from './url-launcher';
export { buildUpdateDialog, defaultDialogText } from './update-dialog';
export type {
  DialogAction,
  DialogActionRole,
  DialogPresenter,
  UpdateDialog,
  UpdateDialogOptions,
} from './update-dialog';
