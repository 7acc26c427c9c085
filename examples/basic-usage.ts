/**
 * Intent Engine Core - 基础使用示例
 *
 * 这个示例展示如何使用 IntentEngine 处理多轮对话
 */

import { IntentEngine } from '../src';
import { BaseLLM, LLMRequest, LLMResponse } from '../src/types';

/**
 * 简单的 LLM Mock 实现 (实际项目中应替换为真实的 LLM)
 */
class ScriptedLLM implements BaseLLM {
    async generate(request: LLMRequest): Promise<LLMResponse> {
        const last = request.messages[request.messages.length - 1]?.content ?? '';

        // 分类请求：模拟 JSON 响应
        if (last.includes('ANALYZE THIS INPUT:')) {
            const input = last.slice(last.indexOf('ANALYZE THIS INPUT:') + 'ANALYZE THIS INPUT:'.length).trim();
            const category = /^(hi|hello)\b/i.test(input) ? 'greeting' : 'question_answering';
            return {
                text: `\`\`\`json
{
  "category": "${category}",
  "confidence": 0.9,
  "reasoning": "example classifier",
  "entities": {},
  "follow_up_needed": false,
  "context_dependent": false
}
\`\`\``,
                model: 'scripted',
            };
        }

        return { text: `You said: ${last}`, model: 'scripted' };
    }
}

/**
 * 主函数
 */
async function main(): Promise<void> {
    console.log('🚀 Intent Engine Core - 基础使用示例\n');

    const engine = new IntentEngine({
        storage: { sqlitePath: './intent_sessions.db' },
        llm: { classifier: new ScriptedLLM() },
        retention: { maxTurnsPerSession: 50 },
    });

    // 监听状态迁移
    engine.orchestrator.on('transition', (event) => {
        console.log(`   ${event.from ?? '-'} → ${event.to}`);
    });
    engine.orchestrator.on('degraded', (event) => {
        console.log(`   ⚠ 降级回复 (${event.reason})`);
    });

    try {
        for (const text of ['Hello there!', 'What is a context window?']) {
            console.log(`\n> ${text}`);
            const result = await engine.process(text, 'example-session');

            if (result.success) {
                console.log(`   意图: ${result.intent} (${result.confidence}, ${result.source})`);
                console.log(`   回复: ${result.response}`);
            } else {
                console.log(`   失败: ${result.error?.code} ${result.error?.message}`);
            }
        }

        const history = await engine.history('example-session');
        console.log(`\n会话共 ${history.length} 个轮次`);

        const status = await engine.getStatus();
        console.log('状态:', JSON.stringify(status.summary, null, 2));
    } finally {
        await engine.close();
    }
}

main().catch((error) => {
    console.error('示例运行失败:', error);
    process.exit(1);
});
