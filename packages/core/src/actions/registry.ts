import { ActionKind } from './kinds';
import { ACTION_RESULT_SCHEMAS, type ActionResultSchema } from './schemas';

/**
 * Declarative description of a single conversational capability.
 */
export interface ActionDefinition<K extends ActionKind = ActionKind> {
  kind: K;
  /** Prompt id in the prompt repository */
  promptId: string;
  schema: ActionResultSchema<K>;
  description: string;
}

type ActionRegistry = { readonly [K in ActionKind]: ActionDefinition<K> };

function define<K extends ActionKind>(
  kind: K,
  promptId: string,
  description: string
): ActionDefinition<K> {
  return { kind, promptId, schema: ACTION_RESULT_SCHEMAS[kind], description };
}

const ACTIONS: ActionRegistry = {
  [ActionKind.GREETING]: define(
    ActionKind.GREETING,
    'greeting',
    'Greet the staff and state the intent to book a table.'
  ),
  [ActionKind.AVAILABILITY]: define(
    ActionKind.AVAILABILITY,
    'availability',
    'Share desired slot details and interpret staff availability responses.'
  ),
  [ActionKind.DETAILS_COLLECTION]: define(
    ActionKind.DETAILS_COLLECTION,
    'details',
    "Provide the guest's booking details and confirm next steps."
  ),
  [ActionKind.MENU_DISCUSSION]: define(
    ActionKind.MENU_DISCUSSION,
    'menu',
    'Ask the staff follow-up questions about the menu.'
  ),
  [ActionKind.CONFIRMATION]: define(
    ActionKind.CONFIRMATION,
    'confirmation',
    "Interpret the staff's final answer and react as the guest."
  ),
  [ActionKind.ALTERNATIVE]: define(
    ActionKind.ALTERNATIVE,
    'alternative',
    'Evaluate and respond to alternative slots suggested by the staff.'
  ),
  [ActionKind.ERROR_RECOVERY]: define(
    ActionKind.ERROR_RECOVERY,
    'error-recovery',
    'Recover from booking errors and restart the request if needed.'
  ),
  [ActionKind.SAVE_RESERVATION]: define(
    ActionKind.SAVE_RESERVATION,
    'save-reservation',
    'Thank the staff once the booking is confirmed and note any follow-up.'
  ),
};

export function getAction<K extends ActionKind>(kind: K): ActionDefinition<K> {
  return ACTIONS[kind];
}

export function allActions(): ActionDefinition[] {
  return Object.values(ActionKind).map((kind) => getAction(kind));
}
