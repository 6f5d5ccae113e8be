#!/usr/bin/env node

import 'dotenv/config';
import { program } from 'commander';
import chalk from 'chalk';
import { isOperationClass, OPERATION_CLASSES } from '@carecircle/core';
import { CliContext, GlobalOptions, clearSession, openContext, saveSession } from './state.js';
import { startInteractive } from './interactive.js';
import { describeError, formatGroupLine, formatRequest, formatTrial, printGroup, printProfile } from './format.js';

/** Opens the state file, runs one command as the current actor and writes the state back. */
function withContext<A extends unknown[]>(fn: (ctx: CliContext, ...args: A) => Promise<void>) {
    return async (...args: A) => {
        try {
            const ctx = await openContext(program.opts<GlobalOptions>());
            await fn(ctx, ...args);
            await ctx.save();
        } catch (e) {
            console.error(chalk.red(`Error: ${describeError(e)}`));
            process.exit(1);
        }
    };
}

program
    .name('carecircle')
    .description('CLI for CareCircle caregiver groups')
    .version('1.0.0')
    .option('--state <path>', 'State file (defaults to $CARECIRCLE_STATE_FILE or ~/.carecircle/state.json)')
    .option('--as <userId>', 'Act as this user instead of the logged in one')
    .option('--at <timestamp>', 'Pretend the current time is this ISO timestamp')
    .action(withContext(startInteractive));

program
    .command('login <userId>')
    .description('Remember the user to act as')
    .action(async (userId: string) => {
        const session = await saveSession(userId);
        console.log(chalk.green(`Logged in as ${session.actorId}.`));
    });

program
    .command('logout')
    .description('Forget the current user')
    .action(async () => {
        await clearSession();
        console.log(chalk.green("Logged out successfully."));
    });

program
    .command('groups')
    .description('List the circles you belong to')
    .action(withContext(async ({ client }) => {
        const groups = await client.myGroups();
        if (groups.length === 0) console.log(chalk.gray("No circles."));
        groups.forEach(g => console.log(formatGroupLine(g)));
    }));

program
    .command('create <name>')
    .description('Create a circle and become its admin')
    .option('-d, --display-name <name>', 'Your display name inside the circle')
    .option('--require-approval', 'New members need an admin to approve them')
    .option('--replace', 'Delete the circle you already own first')
    .action(withContext(async ({ client }, name: string, opts: { displayName?: string; requireApproval?: boolean; replace?: boolean }) => {
        const group = await client.createGroup(name, {
            displayName: opts.displayName,
            requireApproval: opts.requireApproval,
            replaceExisting: opts.replace,
        });
        console.log(chalk.green(`Created ${group.name}. Invite code: ${chalk.bold(group.inviteCode)}`));
    }));

program
    .command('start-own <name>')
    .description('Start your own circle after leaving one (counts towards the lifetime limit)')
    .option('-d, --display-name <name>', 'Your display name inside the circle')
    .action(withContext(async ({ client }, name: string, opts: { displayName?: string }) => {
        const group = await client.startOwnGroupAfterLeaving(name, { displayName: opts.displayName });
        console.log(chalk.green(`Created ${group.name}. Invite code: ${chalk.bold(group.inviteCode)}`));
    }));

program
    .command('show <groupId>')
    .description('Show a circle, its members and its trial')
    .action(withContext(async ({ client }, groupId: string) => {
        const [group, members, trial] = await Promise.all([
            client.getGroup(groupId),
            client.members(groupId),
            client.trialStatus(groupId),
        ]);
        printGroup(group, members, trial);
    }));

program
    .command('preview <code>')
    .description('Look up the circle behind an invite code')
    .action(withContext(async ({ client }, code: string) => {
        const summary = await client.previewInvite(code);
        console.log(`${chalk.bold(summary.name)}  ${summary.memberCount} member(s)${summary.isFull ? chalk.red(' (full)') : ''}`);
        console.log(`Approval ${summary.requireApproval ? 'required' : 'not required'}`);
    }));

program
    .command('join <code> <displayName>')
    .description('Join a circle with an invite code')
    .action(withContext(async ({ client }, code: string, displayName: string) => {
        const outcome = await client.requestJoin(code, displayName);
        if (outcome.status === 'joined') {
            console.log(chalk.green(`Joined ${outcome.group.name}.`));
        } else {
            console.log(chalk.yellow(`Request ${outcome.request.id} is waiting for an admin.`));
        }
    }));

program
    .command('requests <groupId>')
    .description('List pending join requests')
    .action(withContext(async ({ client }, groupId: string) => {
        const pending = await client.pendingRequests(groupId);
        if (pending.length === 0) console.log(chalk.gray("No pending requests."));
        pending.forEach(r => console.log(formatRequest(r)));
    }));

program
    .command('approve <groupId> <requestId>')
    .description('Approve a join request')
    .action(withContext(async ({ client }, groupId: string, requestId: string) => {
        const { member } = await client.approve(groupId, requestId);
        console.log(chalk.green(`${member.displayName} joined the circle.`));
    }));

program
    .command('deny <groupId> <requestId>')
    .description('Deny a join request')
    .action(withContext(async ({ client }, groupId: string, requestId: string) => {
        const request = await client.deny(groupId, requestId);
        console.log(chalk.yellow(`Denied ${request.userName}.`));
    }));

program
    .command('cancel <groupId> <requestId>')
    .description('Withdraw your own join request')
    .action(withContext(async ({ client }, groupId: string, requestId: string) => {
        await client.cancelRequest(groupId, requestId);
        console.log(chalk.green("Request cancelled."));
    }));

program
    .command('leave <groupId>')
    .description('Leave a circle (starts a 30 day cooldown)')
    .action(withContext(async ({ client }, groupId: string) => {
        const profile = await client.leave(groupId);
        console.log(chalk.green("You left the circle."));
        printProfile(profile);
    }));

program
    .command('remove <groupId> <userId>')
    .description('Remove a member (creator only)')
    .action(withContext(async ({ client }, groupId: string, userId: string) => {
        await client.removeMember(groupId, userId);
        console.log(chalk.green(`Removed ${userId}.`));
    }));

program
    .command('promote <groupId> <userId>')
    .description('Make a member an admin (creator only, after 30 days of membership)')
    .action(withContext(async ({ client }, groupId: string, userId: string) => {
        const member = await client.promote(groupId, userId);
        console.log(chalk.green(`${member.displayName} is now an admin.`));
    }));

program
    .command('access <groupId> <userId> <state>')
    .description("Turn a member's access on or off")
    .action(withContext(async ({ client }, groupId: string, userId: string, state: string) => {
        if (state !== 'on' && state !== 'off') throw new Error("State must be 'on' or 'off'.");
        const member = await client.toggleAccess(groupId, userId, state === 'on');
        console.log(chalk.green(`Access for ${member.displayName} is ${state}.`));
    }));

program
    .command('rename <groupId> <name>')
    .description('Rename a circle')
    .action(withContext(async ({ client }, groupId: string, name: string) => {
        const group = await client.updateGroupMeta(groupId, { name });
        console.log(chalk.green(`Renamed to ${group.name}.`));
    }));

program
    .command('nickname <groupId> <userId> <displayName>')
    .description('Change a display name inside a circle')
    .action(withContext(async ({ client }, groupId: string, userId: string, displayName: string) => {
        const member = await client.updateMember(groupId, userId, { displayName });
        console.log(chalk.green(`${member.userId} is now ${member.displayName}.`));
    }));

program
    .command('delete <groupId>')
    .description('Delete a circle you created')
    .action(withContext(async ({ client }, groupId: string) => {
        await client.deleteGroup(groupId);
        console.log(chalk.green("Circle deleted."));
    }));

program
    .command('trial <groupId>')
    .description('Show the trial or subscription state of a circle')
    .action(withContext(async ({ client }, groupId: string) => {
        console.log(formatTrial(await client.trialStatus(groupId)));
    }));

program
    .command('authorize <groupId> <operation>')
    .description(`Check an operation class (${OPERATION_CLASSES.join(', ')})`)
    .action(withContext(async ({ client }, groupId: string, operation: string) => {
        if (!isOperationClass(operation)) throw new Error(`Unknown operation class: ${operation}`);
        const decision = await client.checkAccess(groupId, operation);
        console.log(decision.allowed ? chalk.green('allowed') : chalk.red(`denied: ${decision.reason}`));
    }));

program
    .command('profile')
    .description('Show your cooldown and transition state')
    .action(withContext(async ({ client }) => {
        printProfile(await client.profile());
    }));

program
    .command('today')
    .description("Check this device's free daily session")
    .option('--use', 'Use the session')
    .action(withContext(async ({ engine, deviceId }, opts: { use?: boolean }) => {
        if (opts.use) await engine.dailyAccess.markUsed(deviceId);
        const status = await engine.dailyAccess.status(deviceId);
        console.log(status.available
            ? chalk.green(`Available (${status.accessDate})`)
            : chalk.yellow(`Used today. Next session in ${Math.ceil(status.msUntilNextAccess / 60000)} minute(s).`));
    }));

await program.parseAsync(process.argv);
