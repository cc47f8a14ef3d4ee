export { App } from './App.js';
export type { AppProps, LauncherOutcome } from './App.js';
export type { NoticeMessage, NoticeTone } from './components/Notice.js';
export { formFields, formTitle, initialValues, submitForm, toFormError } from './form.js';
export type { FormError, FormField, FormOutcome, FormTarget, FormValues } from './form.js';
