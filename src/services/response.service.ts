import brandModels from '../data/brand-models.json';
import { CarData, PersonalData } from '../types/conversation';
import { ResponseEvent } from '../types/events';
import { TextCompletionProvider } from './llm/completion.adapter';
import { failingReasons } from './eligibility.service';
import { buildResponsePrompt } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ResponseRenderer {
  render(event: ResponseEvent | null): Promise<string>;
}

export interface ResponseServiceOptions {
  completion?: TextCompletionProvider;
  useLLMResponses?: boolean;
}

interface Rendered {
  text: string;
  /** Present when the completion provider may rephrase the text. */
  llmContext?: string;
}

const MODEL_EXAMPLES: Record<string, string> = brandModels;

export function modelExamplesFor(brand: string | null | undefined): string | null {
  if (!brand) return null;
  return MODEL_EXAMPLES[brand.toLowerCase()] ?? null;
}

/** 45000 -> "45.000" */
export function formatMileage(mileage: number): string {
  return String(mileage).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

function describePersonalData(data: PersonalData): string {
  return `nombre ${data.fullName ?? ''}, año de nacimiento ${data.birthYear ?? ''} y email ${data.email ?? ''}`;
}

function describeCarData(data: CarData): string {
  return `${data.brand ?? ''} ${data.model ?? ''} del ${data.year ?? ''} con ${formatMileage(data.mileage ?? 0)}km`;
}

export class ResponseService implements ResponseRenderer {
  private completion: TextCompletionProvider | null;
  private useLLMResponses: boolean;

  constructor(options: ResponseServiceOptions = {}) {
    this.completion = options.completion ?? null;
    this.useLLMResponses = Boolean(options.useLLMResponses && options.completion);
  }

  async render(event: ResponseEvent | null): Promise<string> {
    if (event === null) return '';

    const { text, llmContext } = this.template(event);
    if (!llmContext || !this.useLLMResponses || !this.completion) {
      return text;
    }

    try {
      const generated = (await this.completion.complete(buildResponsePrompt(llmContext))).trim();
      return generated || text;
    } catch (error: unknown) {
      logger.warn('Response generation failed, using template', { event: event.type, error: errorMessage(error) });
      return text;
    }
  }

  template(event: ResponseEvent): Rendered {
    switch (event.type) {
      case 'greeting':
        return {
          text: '¡Hola! Soy tu asistente virtual. Voy a ayudarte a validar si tu auto es elegible para nuestro producto. Para comenzar, ¿me dices tu nombre completo?',
          llmContext: 'La conversación acaba de empezar. Saluda, preséntate como asistente virtual, explica que ayudarás a validar la elegibilidad del auto y pide el nombre completo.',
        };
      case 'asked_birth_year':
        return {
          text: `Gracias, ${event.firstName}. ¿Cuál es tu año de nacimiento?`,
          llmContext: `El usuario se llama ${event.firstName}. Agradécele y pregunta su año de nacimiento.`,
        };
      case 'asked_email':
        return {
          text: 'Entendido. Por último, ¿a qué correo electrónico te enviamos el resumen?',
          llmContext: 'El usuario ya dio su año de nacimiento. Pide su correo electrónico para enviarle el resumen.',
        };
      case 'confirm_personal_data':
        return {
          text: `¡Perfecto! Tengo: ${describePersonalData(event.snapshot)}. ¿Está todo correcto?`,
          llmContext: `Confirma estos datos personales y pregunta si son correctos: ${describePersonalData(event.snapshot)}.`,
        };
      case 'personal_confirmed':
        return {
          text: `Perfecto, ${event.firstName}. Ahora necesito los datos de tu vehículo. ¿Cuál es la marca de tu auto? (Ejemplo: Toyota, Ford, Nissan)`,
          llmContext: `${event.firstName} confirmó sus datos personales. Pide ahora la marca de su auto.`,
        };
      case 'personal_data_reset':
        return { text: 'De acuerdo, empecemos de nuevo. ¿Cuál es tu nombre completo?' };
      case 'invalid_confirmation':
        return { text: "Por favor, responde 'Sí' o 'No'. ¿Los datos son correctos?" };
      case 'invalid_name':
        return { text: 'No pude entender tu nombre. ¿Me das tu nombre completo? (Ejemplo: Juan Pérez)' };
      case 'invalid_birth_year':
        return { text: 'No pude entender el año. ¿Cuál es tu año de nacimiento? (Ejemplo: 1995)' };
      case 'invalid_email':
        return { text: 'No pude entender el email. ¿Cuál es tu correo electrónico?' };
      case 'unsafe_input':
        return { text: event.message };
      case 'asked_car_model': {
        const examples = modelExamplesFor(event.brand);
        return {
          text: examples
            ? `¿Y cuál es el modelo exacto de tu ${event.brand}? (Ejemplo: ${examples})`
            : `¿Y cuál es el modelo exacto de tu ${event.brand}?`,
        };
      }
      case 'asked_car_year':
        return { text: `Excelente. ¿De qué año es tu ${event.brand} ${event.model}?` };
      case 'asked_mileage':
        return { text: 'Por último, ¿cuál es el kilometraje aproximado de tu vehículo?' };
      case 'confirm_car_data':
        return { text: `¡Perfecto! ${describeCarData(event.snapshot)}, ¿correcto?` };
      case 'car_data_reset':
        return {
          text: `De acuerdo, ${event.firstName}. Empecemos de nuevo con los datos del auto. ¿Cuál es la marca de tu auto?`,
        };
      case 'invalid_car_confirmation':
        return { text: "Por favor, responde 'Sí' o 'No'. ¿Los datos del auto son correctos?" };
      case 'invalid_car_brand':
        return { text: 'No pude entender la marca. ¿Cuál es la marca de tu auto? (Ejemplo: Toyota, Ford, Honda)' };
      case 'invalid_car_model': {
        const examples = modelExamplesFor(event.brand);
        const subject = event.brand ? `tu ${event.brand}` : 'tu auto';
        return {
          text: examples
            ? `No pude entender el modelo. ¿Cuál es el modelo exacto de ${subject}? (Ejemplo: ${examples})`
            : `No pude entender el modelo. ¿Cuál es el modelo exacto de ${subject}?`,
        };
      }
      case 'invalid_car_year':
        return { text: 'No pude entender el año. ¿De qué año es tu vehículo? (Ejemplo: 2018)' };
      case 'invalid_mileage':
        return { text: 'No pude entender el kilometraje. ¿Cuántos kilómetros tiene tu vehículo? (Ejemplo: 45000)' };
      case 'missing_evaluation_data':
        return { text: 'Error: faltan datos para evaluar la elegibilidad.' };
      case 'eligibility_unavailable':
        return { text: 'Error al evaluar la elegibilidad.' };
      case 'eligibility_announced': {
        const { result, firstName } = event;
        if (result.isEligible) {
          return {
            text: `¡Buenas noticias, ${firstName}! Según los criterios iniciales, eres elegible para nuestro producto.`,
            llmContext: `${firstName} ES ELEGIBLE para el producto. Dale la noticia con entusiasmo.`,
          };
        }
        const reasons = failingReasons(result);
        return {
          text: [
            `Lamentablemente, ${firstName}, no cumples con los criterios de elegibilidad:`,
            ...reasons.map((reason) => `- ${reason}`),
          ].join('\n'),
          llmContext: `${firstName} NO ES ELEGIBLE. Motivos: ${reasons.join(', ')}. Infórmalo con empatía.`,
        };
      }
      default: {
        const unhandled: never = event;
        throw new Error(`Unhandled response event: ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
