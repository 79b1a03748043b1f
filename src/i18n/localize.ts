type SupportedLocale = 'en' | 'zh-cn';

type LocalizationParams = Record<string, string | number>;

type TranslationEntry = Record<SupportedLocale, string>;

const API_KEY_HELP = {
  en: 'How to fix:\n1. Set the environment variable: export {envVar}=<your_api_key>\n2. Or provide the key manually: transome -k <your_api_key> -m {model} <text>\n\nWhere to get an API key:\n- OpenAI API key: {openaiKeyUrl}\n- Google AI API key: {googleKeyUrl}',
  'zh-cn': '解决方法：\n1. 设置环境变量: export {envVar}=<your_api_key>\n2. 或者手动提供密钥: transome -k <your_api_key> -m {model} <文本>\n\n获取 API 密钥的方法：\n- OpenAI API 密钥: {openaiKeyUrl}\n- Google AI API 密钥: {googleKeyUrl}',
} as const;

const translations = {
  'error.validation.textRequired': {
    en: 'Text to translate is required.\n\nUsage: transome [options] <text>\n\nFor more information, run: transome --help',
    'zh-cn': '要翻译的文本是必需的\n\n使用方法: transome [选项] <文本>\n\n获取更多信息，使用: transome --help',
  },
  'error.validation.textEmpty': {
    en: 'Text to translate cannot be empty.\n\nUsage: transome [options] <text>\n\nFor more information, run: transome --help',
    'zh-cn': '要翻译的文本不能为空\n\n使用方法: transome [选项] <文本>\n\n获取更多信息，使用: transome --help',
  },
  'error.validation.generic': {
    en: "Invalid value for '{field}': expected {expected}, got {actual}.\n\nFor more information, run: transome --help",
    'zh-cn': "字段 '{field}' 无效：期望 {expected}，实际 {actual}\n\n获取更多信息，使用: transome --help",
  },
  'error.config.noEnvVar': {
    en: "Cannot determine the environment variable for model '{model}'.\n\nSupported models and their environment variables:\n- OpenAI models (gpt-4, gpt-4o, gpt-3.5-turbo, ...): OPENAI_API_KEY\n- Google Gemini models (gemini-2.5-flash, gemini-1.5-pro, ...): GOOGLE_AI_API_KEY\n\nHow to fix:\n1. Use a supported model: transome -m <supported model> <text>\n2. Provide the API key manually: transome -k <your_api_key> -m {model} <text>\n3. List all supported models: transome --list-models",
    'zh-cn': "无法为模型 '{model}' 确定对应的环境变量。\n\n支持的模型及其环境变量：\n- OpenAI 模型 (gpt-4, gpt-4o, gpt-3.5-turbo 等): OPENAI_API_KEY\n- Google Gemini 模型 (gemini-2.5-flash, gemini-1.5-pro 等): GOOGLE_AI_API_KEY\n\n解决方法：\n1. 使用支持的模型: transome -m <支持的模型名称> <文本>\n2. 手动提供 API 密钥: transome -k <your_api_key> -m {model} <文本>\n3. 查看所有支持的模型: transome --list-models",
  },
  'error.auth.envUnset': {
    en: `Environment variable {envVar} is not set.\n\n${API_KEY_HELP.en}`,
    'zh-cn': `环境变量 {envVar} 未设置。\n\n${API_KEY_HELP['zh-cn']}`,
  },
  'error.auth.envEmpty': {
    en: `Environment variable {envVar} is set but empty.\n\n${API_KEY_HELP.en}`,
    'zh-cn': `环境变量 {envVar} 已设置但为空。\n\n${API_KEY_HELP['zh-cn']}`,
  },
  'error.auth.rejected': {
    en: "Authentication failed: {detail}\n\nCheck that your API key is correct and has the necessary permissions.\nFor OpenAI: ensure your API key starts with 'sk-'\nFor Gemini: ensure you are using a valid Google AI API key\nTo use another key: transome -k <your_api_key> -m {model} <text>",
    'zh-cn': "认证失败：{detail}\n\n请检查 API 密钥是否正确并具有相应权限。\nOpenAI：确保密钥以 'sk-' 开头\nGemini：确保使用有效的 Google AI API 密钥\n使用其他密钥: transome -k <your_api_key> -m {model} <文本>",
  },
  'error.api.modelNotFound': {
    en: "Model not found: {detail}\n\nPlease verify that:\n- The model name '{model}' is correct and available\n- The API endpoint {endpoint} is accessible\n- You have permission to use this model\n\nList supported models: transome --list-models",
    'zh-cn': "找不到模型：{detail}\n\n请确认：\n- 模型名称 '{model}' 正确且可用\n- API 端点 {endpoint} 可以访问\n- 你有权限使用该模型\n\n列出所有模型: transome --list-models",
  },
  'error.api.endpointNotFound': {
    en: "Endpoint not found: {detail}\n\nPlease verify that:\n- The API endpoint {endpoint} is correct (override it with -u <url>)\n- The model name '{model}' is correct and available\n\nList supported models: transome --list-models",
    'zh-cn': "找不到端点：{detail}\n\n请确认：\n- API 端点 {endpoint} 正确（可通过 -u <URL> 覆盖）\n- 模型名称 '{model}' 正确且可用\n\n列出所有模型: transome --list-models",
  },
  'error.api.rateLimit': {
    en: 'Rate limit exceeded: {detail}\n\nWait a moment before trying again. Consider upgrading your API plan if this happens frequently.\nTo switch models: transome -m <model> <text> (see transome --list-models)',
    'zh-cn': '超出速率限制：{detail}\n\n请稍候再试。如果频繁出现，请考虑升级 API 套餐。\n切换模型: transome -m <模型名称> <文本>（参见 transome --list-models）',
  },
  'error.api.generic': {
    en: 'API call to {endpoint} failed{status}: {detail}\n\nCheck your network connection, API key and model name.\nIf the problem persists, the AI service may be temporarily unavailable. Try another model with -m (see transome --list-models) or another endpoint with -u <url>.',
    'zh-cn': 'API 调用 {endpoint} 失败{status}：{detail}\n\n请检查网络连接、API 密钥和模型名称。\n如果问题持续存在，AI 服务可能暂时不可用。可通过 -m 换用其他模型（参见 transome --list-models）或通过 -u <URL> 换用其他端点。',
  },
  'error.api.statusSuffix': {
    en: ' with status {status}',
    'zh-cn': '，状态码 {status}',
  },
  'error.network.connect': {
    en: 'Network error while calling {endpoint}: {detail}\n\nCheck your internet connection and try again.\nIf the problem persists, the API service may be temporarily unavailable; another endpoint can be used with -u <url>.',
    'zh-cn': '调用 {endpoint} 时发生网络错误：{detail}\n\n请检查网络连接后重试。\n如果问题持续存在，API 服务可能暂时不可用；可通过 -u <URL> 使用其他端点。',
  },
  'error.network.timeout': {
    en: 'Request to {endpoint} timed out: {detail}\n\nCheck your internet connection and try again, or raise the limit: export TRANSOME_TIMEOUT_MS=<milliseconds>',
    'zh-cn': '请求 {endpoint} 超时：{detail}\n\n请检查网络连接后重试，或提高超时时间: export TRANSOME_TIMEOUT_MS=<毫秒>',
  },
  'error.emptyResult.noChoices': {
    en: 'No translation results in API response.\n\nThis may indicate an issue with the AI model or service. Try again or use a different model: transome -m <model> <text> (see transome --list-models)',
    'zh-cn': 'API 响应中没有翻译结果。\n\n这可能是 AI 模型或服务的问题。请重试或换用其他模型: transome -m <模型名称> <文本>（参见 transome --list-models）',
  },
  'error.emptyResult.allEmpty': {
    en: 'Translation result is empty.\n\nThe AI model returned an empty response. This may be due to:\n- The input text being unclear or untranslatable\n- Issues with the model or prompt\n- Temporary service problems\n\nTry again with different text, another prompt (-p <prompt>) or another model (see transome --list-models).',
    'zh-cn': '翻译结果为空。\n\nAI 模型返回了空响应，可能的原因：\n- 输入文本不清晰或无法翻译\n- 模型或提示词存在问题\n- 服务暂时出现问题\n\n请更换文本、提示词（-p <提示词>）或模型（参见 transome --list-models）后重试。',
  },
  'error.invalidResponse': {
    en: 'Unexpected response from {endpoint}: {detail}\n\nThe endpoint may not speak the expected API. Check the URL passed with -u <url>, or pick a supported model (see transome --list-models).',
    'zh-cn': '{endpoint} 返回了无法识别的响应：{detail}\n\n该端点可能不兼容所需的 API。请检查 -u <URL> 指定的地址，或选择支持的模型（参见 transome --list-models）。',
  },
  'error.modelNotFound.heading': {
    en: "Model '{model}' not found",
    'zh-cn': "找不到模型 '{model}'",
  },
  'error.modelNotFound.supported': {
    en: 'Supported models:',
    'zh-cn': '支持的模型:',
  },
  'error.modelNotFound.usage': {
    en: 'Usage:\n  Use a supported model: transome -m <model> "<text>"\n  Or provide a custom URL: transome -u <url> -m <model> "<text>"\n  List all models: transome --list-models',
    'zh-cn': '使用方法:\n  使用支持的模型: transome -m <模型名称> "<文本>"\n  或提供自定义 URL: transome -u <URL> -m <模型名称> "<文本>"\n  列出所有模型: transome --list-models',
  },
  'friendly.modelNotFound': {
    en: "Model '{model}' not found; available models: {models}",
    'zh-cn': "找不到模型 '{model}'，可用的模型有：{models}",
  },
  'friendly.modelNotFound.none': {
    en: "Model '{model}' not found; no models are available",
    'zh-cn': "找不到模型 '{model}'，当前没有可用的模型",
  },
  'friendly.requestError': {
    en: 'Request error ({status}): check the parameters or permissions',
    'zh-cn': '请求错误 ({status}): 请检查参数或权限配置',
  },
  'friendly.serverError': {
    en: 'Server error ({status}): please try again later',
    'zh-cn': '服务器错误 ({status}): 请稍后重试',
  },
  'friendly.apiFailed': {
    en: 'API call failed: {detail}',
    'zh-cn': 'API调用失败: {detail}',
  },
  'friendly.network.connect': {
    en: 'Network connection failed, check your network settings',
    'zh-cn': '网络连接失败，请检查网络设置',
  },
  'friendly.network.timeout': {
    en: 'Request timed out, please try again later',
    'zh-cn': '请求超时，请稍后重试',
  },
  'friendly.authentication': {
    en: 'Authentication failed, check your API key or credential configuration',
    'zh-cn': '认证失败，请检查API密钥或凭据配置',
  },
  'friendly.config': {
    en: "Configuration error: check the '{field}' setting",
    'zh-cn': "配置错误：请检查 '{field}' 字段的设置",
  },
  'friendly.validation': {
    en: "Invalid argument: '{field}' should be {expected}",
    'zh-cn': "参数错误：'{field}' 字段应为 {expected}",
  },
  'friendly.generic': {
    en: 'Operation failed, please try again',
    'zh-cn': '操作失败，请重试',
  },
  'listModels.heading': {
    en: 'Supported models:',
    'zh-cn': '支持的模型:',
  },
  'listModels.usage': {
    en: 'Usage:\n  transome [options] [text]\n\nOptions:\n  -m, --model <model>    use a supported model from the list above\n  -u, --url <url>        use a custom API URL (overrides model selection)\n\nExamples:\n  transome -m gpt-4 "Hello world"\n  transome -u https://custom.api.com/v1 -m custom-model "Hello world"',
    'zh-cn': '使用方法:\n  transome [选项] [文本]\n\n选项:\n  -m, --model <模型>    使用上述列表中的支持模型\n  -u, --url <地址>      使用自定义 API 地址（覆盖模型选择）\n\n示例:\n  transome -m gpt-4 "Hello world"\n  transome -u https://custom.api.com/v1 -m custom-model "Hello world"',
  },
  'cli.error': {
    en: 'Error: {message}',
    'zh-cn': '错误：{message}',
  },
  'cli.hint': {
    en: 'Hint: {message}',
    'zh-cn': '提示：{message}',
  },
} as const satisfies Record<string, TranslationEntry>;

export type TranslationKey = keyof typeof translations;

function normalizeLocale(language?: string): SupportedLocale {
  const value = (language ?? '').toLowerCase();

  if (value.startsWith('zh')) {
    return 'zh-cn';
  }

  return 'en';
}

function format(template: string, params?: LocalizationParams): string {
  if (!params) {
    return template;
  }

  return template.replace(/\{(\w+)\}/g, (match: string, token: string) => {
    const replacement = params[token];

    if (replacement === undefined) {
      return match;
    }

    return String(replacement);
  });
}

export function localize(
  key: TranslationKey,
  params?: LocalizationParams,
  options?: { language?: string },
): string {
  const locale = normalizeLocale(options?.language);
  const entry: TranslationEntry = translations[key];
  return format(entry[locale], params);
}
