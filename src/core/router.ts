import type { Logger } from 'pino';
import type { AssistantConfig } from '../config/assistant.js';
import type { CatalogStore } from './catalog.js';
import {
  CLARIFY_REPLY,
  FALLBACK_REPLY,
  GREETING_REPLY,
  RESET_REPLY,
  SEARCH_USAGE_REPLY,
  composeHistorySearchReply,
  composeLookupReply,
  composeNoMatchReply,
  composeTooLongReply,
} from './composers.js';
import type { ConversationContextManager } from './context_manager.js';
import { LLMUnavailableError, MalformedInputError } from './errors.js';
import type { ChatModel } from './llm.js';
import { normalize } from './normalize.js';
import { resolve, type MatchResult } from './resolver.js';
import type { ConversationEntry } from './session_store.js';

export type MessageClassification =
  | { kind: 'lookup'; query: string }
  | { kind: 'chat'; text: string };

export type ClassifierRules = Pick<AssistantConfig, 'lookupKeywords' | 'lookupCommands' | 'maxMessageLength'>;

export type ReplyKind =
  | 'lookup'
  | 'no_match'
  | 'chat'
  | 'fallback'
  | 'clarify'
  | 'greeting'
  | 'reset'
  | 'history_search';

type ServiceCommand =
  | { name: 'start' }
  | { name: 'reset' }
  | { name: 'search'; query: string };

export const HISTORY_SEARCH_LIMIT = 5;

export interface RouteReply {
  kind: ReplyKind;
  text: string;
  matches?: MatchResult[];
}

function startsWithCommand(lower: string, command: string): boolean {
  if (!lower.startsWith(command)) return false;
  const next = lower.charAt(command.length);
  return next === '' || /\s/.test(next);
}

/** Session commands handled before intent classification. */
export function parseServiceCommand(raw: string): ServiceCommand | undefined {
  const text = (raw ?? '').trim();
  const lower = text.toLowerCase();
  if (startsWithCommand(lower, '/start')) return { name: 'start' };
  if (startsWithCommand(lower, '/reset')) return { name: 'reset' };
  if (startsWithCommand(lower, '/search')) {
    return { name: 'search', query: text.slice('/search'.length).trim() };
  }
  return undefined;
}

/**
 * Lookup-intent when the message opens with a lookup command (the rest is the
 * query) or mentions a lookup keyword as whole words (the whole message is
 * the query). Everything else is chat-intent.
 */
export function classifyMessage(raw: string, rules: ClassifierRules): MessageClassification {
  const text = (raw ?? '').trim();
  if (!text) {
    throw new MalformedInputError('empty', 'Message is empty');
  }
  if (text.length > rules.maxMessageLength) {
    throw new MalformedInputError('too_long', `Message exceeds ${rules.maxMessageLength} characters`);
  }

  const lower = text.toLowerCase();
  const command = rules.lookupCommands.find((c) => startsWithCommand(lower, c));
  if (command) {
    const query = text.slice(command.length).trim();
    if (!query) {
      throw new MalformedInputError('missing_query', `${command} needs a store or city`);
    }
    return { kind: 'lookup', query };
  }

  const padded = ` ${normalize(text)} `;
  const hasKeyword = rules.lookupKeywords.some((keyword) => {
    const token = normalize(keyword);
    return token.length > 0 && padded.includes(` ${token} `);
  });
  return hasKeyword ? { kind: 'lookup', query: text } : { kind: 'chat', text };
}

export interface MessageRouterDeps {
  catalog: CatalogStore;
  contextManager: ConversationContextManager;
  model: ChatModel;
  config: AssistantConfig;
  log: Logger;
}

/**
 * Single entry point for inbound messages. `route` never rejects: every
 * per-message failure turns into a reply.
 *
 * A chat turn is committed to history only once the model has answered; a
 * failed or timed-out exchange leaves the session untouched.
 */
export class MessageRouter {
  constructor(private readonly deps: MessageRouterDeps) {}

  async route(userId: string, rawMessage: string): Promise<RouteReply> {
    const { log } = this.deps;

    const command = parseServiceCommand(rawMessage);
    if (command) {
      try {
        return await this.runCommand(userId, command);
      } catch (error) {
        log.error({ err: error, userId, command: command.name }, 'route_command_failed');
        return { kind: 'fallback', text: FALLBACK_REPLY };
      }
    }

    let classification: MessageClassification;
    try {
      classification = classifyMessage(rawMessage, this.deps.config);
    } catch (error) {
      if (error instanceof MalformedInputError) {
        log.debug({ userId, reason: error.reason }, 'route_clarify');
        const text =
          error.reason === 'too_long' ? composeTooLongReply(this.deps.config.maxMessageLength) : CLARIFY_REPLY;
        return { kind: 'clarify', text };
      }
      log.error({ err: error, userId }, 'route_classify_failed');
      return { kind: 'fallback', text: FALLBACK_REPLY };
    }

    log.debug({ userId, intent: classification.kind }, 'route_classified');

    try {
      switch (classification.kind) {
        case 'lookup':
          return this.lookup(classification.query);
        case 'chat':
          return await this.chat(userId, classification.text);
      }
    } catch (error) {
      if (error instanceof LLMUnavailableError) {
        log.warn({ userId, reason: error.reason, status: error.status }, 'llm_unavailable');
      } else {
        log.error({ err: error, userId }, 'route_failed');
      }
      return { kind: 'fallback', text: FALLBACK_REPLY };
    }
  }

  private async runCommand(userId: string, command: ServiceCommand): Promise<RouteReply> {
    const { contextManager } = this.deps;
    switch (command.name) {
      case 'start':
        return { kind: 'greeting', text: GREETING_REPLY };
      case 'reset':
        await contextManager.reset(userId);
        return { kind: 'reset', text: RESET_REPLY };
      case 'search': {
        if (!command.query) return { kind: 'clarify', text: SEARCH_USAGE_REPLY };
        const hits = await contextManager.search(userId, command.query, HISTORY_SEARCH_LIMIT);
        return { kind: 'history_search', text: composeHistorySearchReply(command.query, hits) };
      }
    }
  }

  private lookup(query: string): RouteReply {
    const { catalog, config, log } = this.deps;
    const matches = resolve(query, catalog, {
      fuzzyThreshold: config.fuzzyThreshold,
      minMatchesBeforeFuzzy: config.minMatchesBeforeFuzzy,
    });
    log.debug({ matches: matches.length, top: matches[0]?.matchKind }, 'route_lookup');

    if (matches.length === 0) {
      return { kind: 'no_match', text: composeNoMatchReply(query) };
    }
    return { kind: 'lookup', text: composeLookupReply(matches, config.maxResults), matches };
  }

  private async chat(userId: string, text: string): Promise<RouteReply> {
    const { contextManager, config } = this.deps;
    const history = await contextManager.snapshot(userId);
    const context = config.contextWindow > 0 ? history.slice(-config.contextWindow) : [];

    const reply = await this.completeWithDeadline(context, text);
    await contextManager.appendExchange(userId, text, reply);
    return { kind: 'chat', text: reply };
  }

  private async completeWithDeadline(history: readonly ConversationEntry[], text: string): Promise<string> {
    const timeoutMs = this.deps.config.llmTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new LLMUnavailableError('timeout', `LLM did not answer within ${timeoutMs} ms`));
      }, timeoutMs);
    });

    try {
      const reply = await Promise.race([
        this.deps.model.complete(history, text, { signal: controller.signal }),
        deadline,
      ]);
      const trimmed = reply.trim();
      if (!trimmed) {
        throw new LLMUnavailableError('empty_response', 'LLM returned no text');
      }
      return trimmed;
    } finally {
      clearTimeout(timer);
    }
  }
}
