#!/usr/bin/env tsx

/**
 * S式ツールの動作確認スクリプト
 * zxを使ってCLIの全機能を実行します
 */

import { $ } from 'zx';

// zxの設定
$.verbose = true;

console.log('🚀 sexpr - 動作確認開始\n');

try {
  // 1. トークン化
  console.log('📝 1. トークン化のテスト');
  await $`npx tsx src/cli.ts tokens examples/example1.scm`;

  console.log('\n   位置とコメント付き:');
  await $`npx tsx src/cli.ts tokens examples/data.scm --pos --comments`;

  console.log('\n   空白も表示:');
  await $`npx tsx src/cli.ts tokens examples/example1.scm --whitespace`;

  console.log('\n   gambit形式（foo: キーワードと8進エスケープ）:');
  await $`npx tsx src/cli.ts print examples/gambit.scm --format gambit`;

  // 2. 読み込みと再出力
  console.log('\n🔁 2. 再出力のテスト');
  await $`npx tsx src/cli.ts print examples/data.scm`;

  console.log('\n   クォートを省略形で出力:');
  await $`npx tsx src/cli.ts print examples/data.scm --quotes`;

  console.log('\n   guile形式:');
  await $`npx tsx src/cli.ts print examples/data.scm --format guile`;

  // 3. 構造ダンプ
  console.log('\n🧩 3. 構造ダンプのテスト');
  await $`npx tsx src/cli.ts dump examples/example1.scm`;

  // 4. 差分
  console.log('\n🔍 4. 差分のテスト');
  await $`npx tsx src/cli.ts diff examples/example1.scm examples/example2.scm --no-color`;

  console.log('\n   構造的差分:');
  await $`npx tsx src/cli.ts diff examples/example1.scm examples/example2.scm --structural --no-color`;

  console.log('\n   コンパクト表示:');
  await $`npx tsx src/cli.ts diff examples/example1.scm examples/example2.scm --compact --no-color`;

  // 5. エラーハンドリング
  console.log('\n❌ 5. エラーハンドリングのテスト');
  for (const file of ['examples/broken.scm', 'nonexistent.scm']) {
    const result = await $`npx tsx src/cli.ts print ${file}`.nothrow();
    if (result.exitCode === 1) {
      console.log(`   ✅ ${file}: 期待通りエラーになりました`);
    } else {
      throw new Error(`${file}: exit code ${result.exitCode}`);
    }
  }

  // 6. パフォーマンス
  console.log('\n⚡ 6. パフォーマンステスト');
  const start = Date.now();
  await $`npx tsx src/cli.ts dump examples/data.scm`.quiet();
  console.log(`   処理時間: ${Date.now() - start}ms`);

  console.log('\n✅ 全ての確認が完了しました！');
} catch (error) {
  console.error('\n❌ 確認中にエラーが発生しました:');
  console.error(error);
  process.exit(1);
}
