/**
 * Classifier prompt templates. Placeholders use `{{name}}` and are filled
 * by the builders in prompt-builder.ts.
 */

export const SELECTION_TEMPLATE = `You are overseeing a group chat between several AI agents and a human user.
Decide which participant takes the next turn, based on the conversation so far. Follow these rules:

1. **Participants**: choose only from these participants:
{{participants}}

2. **Rules**:
    - **{{facilitator}} opens**: {{facilitator}} always goes first to formulate a plan. If the only message so far is from the user, {{facilitator}} goes next.
    - **Requests between agents**: agents may talk among themselves. When an agent needs information from another agent, that agent goes next.
        EXAMPLE:
            "*agent_name*, please provide ..." means agent_name goes next.
    - **Hand-backs**: when an agent says "back to you *agent_name*", agent_name goes next.
        EXAMPLE:
            "back to you *agent_name*" means agent_name goes next.
    - **Once per round**: each participant speaks at most once per round.
    - **Default to {{facilitator}}**: if no other participant is clearly addressed, {{facilitator}} goes next.
    - **Use judgment**: when the rules do not settle it, pick whoever keeps the conversation flowing naturally.

**Output**: reply with a JSON object with two string fields. "reasoning" weighs each rule above and explains the choice. "verdict" is exactly one participant name from the list.

History:
{{history}}`;

export const TERMINATION_TEMPLATE = `Decide whether the group chat should pause and hand control back to the user, based on the most recent message.
You only see that last message.

You are part of a group chat with several AI agents and a user.
The agent names are: {{agentNames}}

Return "yes" when:
    - the message is a question addressed to the user
    - the question is addressed to "we" or "us", for example "Should we proceed?"
    - it is a command addressed to "you" or to the User
    - it is a general closing remark
    - you are not certain

Return "no" when:
    - the question or statement is addressed to another agent
    - it is a command that clearly names a specific agent

EXAMPLES:
    - "User, can you confirm the correct patient ID?" => "yes"
    - "*ReportCreation*: Please compile the patient timeline. Let's proceed with *ReportCreation*." => "no" (ReportCreation is an agent)
    - "*ReportCreation*, please proceed ..." => "no" (ReportCreation is an agent)
    - "If you have any further questions or need assistance, feel free to ask." => "yes"
    - "Let's proceed with Radiology." => "no" (Radiology is an agent)

**Output**: reply with a JSON object with two string fields. "reasoning" explains the decision. "verdict" is either "yes" or "no".

History:
{{history}}`;
