/**
 * Prompt Composer Service
 *
 * Turns the session state and the analyzed question into the message list
 * sent to the LLM. The prompt structure:
 * 1. System instructions with the company's name and sector
 * 2. Retrieved document passages (when retrieval found any)
 * 3. Recent conversation turns (for continuity)
 * 4. The user's question
 *
 * Greetings get a dedicated instruction that pins the exact greeting sentence,
 * and never see documents or history.
 */

import {
  CompanyProfile,
  ConversationTurn,
  PromptMessage,
  QuestionProfile,
} from '../../shared/types';

export interface AnswerPromptVars {
  assistantName: string;
  companyName: string;
  sector: string;
  /** Individual questions found in the user's message */
  subQuestions: string[];
  /** The user explicitly asked about laws or articles */
  legalReferenceRequested: boolean;
}

export interface GreetingPromptVars {
  assistantName: string;
  companyName: string;
  sector: string;
  hasProgram: boolean;
}

/**
 * Every text the composer produces. Each template is a plain function of its
 * variables; any of them may be replaced through the composer config.
 */
export interface PromptTemplates {
  answerSystem(vars: AnswerPromptVars): string;
  greetingSystem(vars: GreetingPromptVars): string;
  genericGreeting(assistantName: string): string;
  minimalSystem(assistantName: string): string;
  documentContext(context: string): string;
  historyContext(history: string): string;
}

export interface PromptComposerConfig {
  assistantName: string;
  /** Chat turns (not entries) included in the history block */
  historyTurns: number;
  defaultCompanyName: string;
  defaultSector: string;
  templates: Partial<PromptTemplates>;
}

export const DEFAULT_PROMPT_COMPOSER_CONFIG: PromptComposerConfig = {
  assistantName: 'assistente virtual',
  historyTurns: 6,
  defaultCompanyName: 'Empresa',
  defaultSector: 'não especificado',
  templates: {},
};

export type PromptKind = 'greeting' | 'answer' | 'fallback';

export interface ComposedPrompt {
  kind: PromptKind;
  messages: PromptMessage[];
}

export interface ComposeInput {
  profile: CompanyProfile | null;
  question: string;
  analysis: QuestionProfile;
  /** Chat-turn view of the session history, oldest first */
  history: ConversationTurn[];
  retrievedContext: string;
}

export function programStatusPhrase(hasProgram: boolean): string {
  return hasProgram
    ? 'já possuem um programa de aprendizagem'
    : 'ainda não possuem um programa de aprendizagem';
}

/**
 * The sentence a personalized greeting must consist of.
 */
export function greetingSentence(vars: GreetingPromptVars): string {
  return (
    `Olá! Que bom ter você aqui! Sou o ${vars.assistantName} e estou aqui para ajudar a ` +
    `${vars.companyName} com tudo relacionado à Lei de Aprendizagem. ` +
    `Vi que vocês são do setor de ${vars.sector} e ${programStatusPhrase(vars.hasProgram)}. ` +
    'Como posso ajudar hoje?'
  );
}

export const DEFAULT_PROMPT_TEMPLATES: PromptTemplates = {
  answerSystem: (vars) => {
    const lines = [
      `Você é o ${vars.assistantName}, especialista em Jovem Aprendiz.`,
      '',
      'REGRAS OBRIGATÓRIAS (SEMPRE SIGA ESTAS REGRAS):',
      '1. NUNCA mencione leis, artigos ou base legal, a menos que EXPLICITAMENTE solicitado',
      '2. NUNCA liste "próximos passos" ou qualquer tipo de lista numerada',
      '3. NUNCA use formatos automáticos como "1.", "2.", etc.',
      '4. NUNCA adicione informações não solicitadas',
      `5. SEMPRE use o nome real da empresa: ${vars.companyName}`,
      `6. SEMPRE use o setor real da empresa: ${vars.sector}`,
      '7. SEMPRE mantenha um tom amigável e consultivo',
      '8. SEMPRE personalize as respostas para o contexto da empresa',
      '',
      'SEU COMPORTAMENTO:',
      '- Você é prestativo e focado em soluções',
      '- Você entende profundamente sobre aprendizagem',
      '- Você conhece as necessidades específicas de cada setor',
      '- Você mantém o foco na pergunta atual',
      '- Você evita termos técnicos desnecessários',
      '',
      'ESTRUTURA DE RESPOSTA:',
      '1. Comece reconhecendo o contexto da empresa',
      '2. Responda à pergunta de forma direta',
      '3. Personalize a informação para o setor',
      '4. Termine com uma abertura para mais perguntas',
      '',
      'O QUE EVITAR:',
      '- NÃO use "Base legal:" ou similar',
      '- NÃO use "Próximos passos:" ou similar',
      '- NÃO cite artigos da CLT sem solicitação',
      '- NÃO faça listas numeradas',
      '- NÃO use linguagem muito formal',
    ];

    if (vars.legalReferenceRequested) {
      lines.push('', 'O usuário pediu referência legal: você pode citar a base legal nesta resposta.');
    }
    if (vars.subQuestions.length > 1) {
      lines.push('', `A mensagem contém ${vars.subQuestions.length} perguntas; responda a cada uma delas.`);
    }

    return lines.join('\n');
  },

  greetingSystem: (vars) =>
    [
      `Você é o ${vars.assistantName}.`,
      '',
      'CONTEXTO ESPECÍFICO:',
      `Empresa: ${vars.companyName}`,
      `Setor: ${vars.sector}`,
      `Status: ${vars.hasProgram ? 'Sim' : 'Não'}`,
      '',
      'INSTRUÇÕES EXATAS:',
      'Responda EXATAMENTE neste formato:',
      `"${greetingSentence(vars)}"`,
      '',
      'REGRAS CRÍTICAS:',
      '- Use EXATAMENTE o formato acima',
      '- NÃO adicione NADA além do texto especificado',
      '- NÃO mencione leis ou artigos',
      '- NÃO sugira próximos passos',
      '- NÃO inclua informações adicionais',
    ].join('\n'),

  genericGreeting: (assistantName) =>
    `Olá! Que bom ter você aqui! Sou o ${assistantName} e estou aqui para ajudar com tudo ` +
    'relacionado à Lei de Aprendizagem. Como posso ajudar hoje?',

  minimalSystem: (assistantName) => `Você é o ${assistantName}, especialista em Jovem Aprendiz.`,

  documentContext: (context) => `\nINFORMAÇÕES DOS DOCUMENTOS DE REFERÊNCIA:\n${context}`,

  historyContext: (history) => `\nCONTEXTO ATUAL:\n${history}`,
};

/**
 * "Usuário: ..." / "Assistente: ..." lines, one per turn.
 */
export function formatHistory(turns: ConversationTurn[]): string {
  return turns
    .map((turn) => `${turn.role === 'user' ? 'Usuário' : 'Assistente'}: ${turn.content}`)
    .join('\n');
}

export class PromptComposer {
  private readonly config: PromptComposerConfig;
  private readonly templates: PromptTemplates;

  constructor(config: Partial<PromptComposerConfig> = {}) {
    this.config = { ...DEFAULT_PROMPT_COMPOSER_CONFIG, ...config };
    this.templates = { ...DEFAULT_PROMPT_TEMPLATES, ...this.config.templates };
  }

  compose(input: ComposeInput): ComposedPrompt {
    if (input.analysis.isGreeting) {
      return this.composeGreeting(input.profile);
    }
    return this.composeAnswer(input);
  }

  /**
   * Personalized greeting when both name and sector are known, the generic
   * one otherwise.
   */
  composeGreeting(profile: CompanyProfile | null): ComposedPrompt {
    const { assistantName } = this.config;
    const personalized = profile !== null && Boolean(profile.name) && Boolean(profile.sector);

    try {
      if (!profile || !personalized) {
        return this.systemOnly('greeting', this.templates.genericGreeting(assistantName));
      }
      return this.systemOnly(
        'greeting',
        this.templates.greetingSystem({
          assistantName,
          companyName: profile.name,
          sector: profile.sector,
          hasProgram: profile.hasProgram,
        })
      );
    } catch (error) {
      console.warn('Greeting template failed, using plain greeting:', error);
      return this.systemOnly(
        'fallback',
        profile && personalized
          ? `Olá! Que bom ter você aqui! Sou o ${assistantName} e estou aqui para ajudar a ` +
              `${profile.name} com tudo relacionado à Lei de Aprendizagem. Como posso ajudar hoje?`
          : DEFAULT_PROMPT_TEMPLATES.genericGreeting(assistantName)
      );
    }
  }

  private composeAnswer(input: ComposeInput): ComposedPrompt {
    const { assistantName, defaultCompanyName, defaultSector, historyTurns } = this.config;
    const historyText = historyTurns > 0 ? formatHistory(input.history.slice(-historyTurns)) : '';

    try {
      const messages: PromptMessage[] = [
        {
          role: 'system',
          content: this.templates.answerSystem({
            assistantName,
            companyName: input.profile?.name || defaultCompanyName,
            sector: input.profile?.sector || defaultSector,
            subQuestions: input.analysis.subQuestions,
            legalReferenceRequested: input.analysis.hasLegalReference,
          }),
        },
      ];

      if (input.retrievedContext.trim()) {
        messages.push({ role: 'system', content: this.templates.documentContext(input.retrievedContext) });
      }
      if (historyText) {
        messages.push({ role: 'system', content: this.templates.historyContext(historyText) });
      }
      messages.push({ role: 'user', content: input.question });

      return { kind: 'answer', messages };
    } catch (error) {
      console.warn('Prompt template failed, using minimal prompt:', error);
      return {
        kind: 'fallback',
        messages: [
          { role: 'system', content: DEFAULT_PROMPT_TEMPLATES.minimalSystem(assistantName) },
          { role: 'user', content: input.question },
        ],
      };
    }
  }

  private systemOnly(kind: PromptKind, content: string): ComposedPrompt {
    return { kind, messages: [{ role: 'system', content }] };
  }
}

export function createPromptComposer(config?: Partial<PromptComposerConfig>): PromptComposer {
  return new PromptComposer(config);
}
