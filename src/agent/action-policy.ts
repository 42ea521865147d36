import type { ActionRequest, PendingAction } from './state';

export const DEFAULT_CRITICAL_ACTIONS: readonly string[] = ['delete_element', 'submit_form', 'confirm_payment', 'delete_message', 'remove_item', 'cancel_order', 'close_tab'];

export interface ActionPolicyOptions {
  criticalActions?: readonly string[];
  /** Critical actions the operator has approved ahead of time */
  autoApprove?: readonly string[];
  /** Action through which the reasoning step asks the user a question */
  askUserAction?: string;
}

/** Decides which proposed actions are irreversible or high-impact */
export class ActionPolicy {
  private critical: Set<string>;
  private autoApproved: Set<string>;
  readonly askUserAction: string;

  constructor(options: ActionPolicyOptions = {}) {
    this.critical = new Set(options.criticalActions ?? DEFAULT_CRITICAL_ACTIONS);
    this.autoApproved = new Set(options.autoApprove ?? []);
    this.askUserAction = options.askUserAction ?? 'request_user_confirmation';
  }

  isCritical(name: string): boolean {
    return this.critical.has(name);
  }

  firstCritical(actions: readonly ActionRequest[]): ActionRequest | undefined {
    return actions.find((a) => this.isCritical(a.name));
  }

  /** First critical action still needing a human, falling back to the first critical one */
  pendingApproval(actions: readonly ActionRequest[]): ActionRequest | undefined {
    return actions.find((a) => this.requiresApproval(a)) ?? this.firstCritical(actions);
  }

  requiresApproval(action: PendingAction): boolean {
    return this.isCritical(action.name) && !this.autoApproved.has(action.name);
  }

  isAskUser(name: string): boolean {
    return name === this.askUserAction;
  }

  criticalActions(): string[] {
    return [...this.critical];
  }
}
